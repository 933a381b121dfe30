export { repeat, repeatAsync } from './repeat';
export { threadedRepeat } from './threadedRepeat';
export {
  catchErrors,
  catchErrorsAsync,
  type AsyncGuard,
  type CatchOptions,
  type ErrorClass,
  type Guard,
  type Guarded,
  type SuppressedCall,
} from './catchErrors';
export {
  timeit,
  timeitAsync,
  type AsyncTimer,
  type TimeitOptions,
  type Timer,
  type TimingHandler,
} from './timeit';
export {
  decorator,
  isBareApplication,
  kw,
  KeywordArguments,
  splitKeywordArguments,
  type ConfiguredDecorator,
  type Decorated,
  type DecoratorBody,
  type DecoratorFactory,
  type DecoratorTarget,
  type Keywords,
} from './decorator';
