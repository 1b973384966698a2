import { Injectable, LoggerService } from '@nestjs/common';

import { LOG_LEVELS, type LogLevel } from '../config';
import { redactPII } from './redaction';

@Injectable()
export class StructuredLoggerService implements LoggerService {
  constructor(private readonly minLevel: LogLevel = 'info') {}

  log(message: unknown, context?: string): void {
    this.write('info', message, context);
  }

  error(message: unknown, trace?: string, context?: string): void {
    this.write('error', message, context, trace);
  }

  warn(message: unknown, context?: string): void {
    this.write('warn', message, context);
  }

  debug(message: unknown, context?: string): void {
    this.write('debug', message, context);
  }

  private write(level: LogLevel, message: unknown, context?: string, trace?: string) {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.minLevel)) return;

    const payload: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      message: typeof message === 'string' ? message : undefined,
      context,
      data: typeof message === 'string' ? undefined : redactPII(message),
      ...(trace ? { trace } : {})
    };

    // eslint-disable-next-line no-console
    console.log(JSON.stringify(payload));
  }
}
