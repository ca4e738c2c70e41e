/**
 * Scoped logger handed to every pipeline collaborator.
 *
 * There is no global verbosity switch: the CLI builds one logger from the
 * run configuration and passes it down. Diagnostic output goes to stderr so
 * stdout stays free for the step/summary lines the CLI prints.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Logger with the same sink and verbosity, tagged with a nested scope */
  child(scope: string): Logger;
}

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  verbose: boolean;
  scope?: string;
  sink?: LogSink;
}

const stderrSink: LogSink = (_level, line) => {
  process.stderr.write(`${line}\n`);
};

export function createLogger(options: LoggerOptions): Logger {
  const sink = options.sink ?? stderrSink;
  const scope = options.scope ?? 'tapecut';

  const write = (level: LogLevel, message: string): void => {
    if (level === 'debug' && !options.verbose) return;
    const tag = level === 'warn' ? ' WARN' : level === 'error' ? ' ERROR' : '';
    sink(level, `[${scope}]${tag} ${message}`);
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
    child: (childScope) => createLogger({ ...options, sink, scope: `${scope}:${childScope}` }),
  };
}

/**
 * Logger that drops everything.
 */
export const silentLogger: Logger = createLogger({ verbose: false, sink: () => {} });
