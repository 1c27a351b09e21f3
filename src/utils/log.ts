import log from 'electron-log';

export type LogLevelSetting = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly' | false;

export interface LogTransportOptions {
  logLevel: LogLevelSetting;
  logFile?: string | null;
}

// Nothing is written to disk until a log file is configured.
log.transports.file.level = false;
if (process.env.NODE_ENV === 'test') {
  log.transports.console.level = false;
}

export const configureLogTransports = ({ logLevel, logFile }: LogTransportOptions) => {
  log.transports.console.level = logLevel;
  if (logFile) {
    log.transports.file.resolvePathFn = () => logFile;
    log.transports.file.level = 'info';
  } else {
    log.transports.file.level = false;
  }
};

export const createLogger = (scope: string) => log.scope(scope);
