export {
  createDiagnosticLogger,
  type CreateDiagnosticLoggerOptions,
} from './diagnosticLogger';
export {
  createLoggerSink,
  formatTiming,
  getDefaultDiagnosticSink,
  resetDefaultDiagnosticSinkForTests,
  silentSink,
  type DiagnosticSink,
} from './sink';
