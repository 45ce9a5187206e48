import pino from 'pino';

export interface LoggerOptions {
  level?: pino.LevelWithSilent;
  pretty?: boolean;
}

export function createLogger(name: string = 'fanout-bfs', options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? 'info';

  if (options.pretty) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: 2 },
      },
    });
  }

  // stdout is reserved for command output
  return pino({ name, level }, pino.destination(2));
}

let _logger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: pino.Logger): void {
  _logger = logger;
}
