import { LoggerService, Injectable } from '@nestjs/common';
import { correlationStorage } from '@/presentation/http/rest/middleware/correlation-id.middleware';
import { EnvConfig } from '@/infrastructure/config/env.validation';

type Level = 'verbose' | 'debug' | 'info' | 'warn' | 'error';

const SEVERITY: Record<Level, number> = {
  verbose: 0,
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

@Injectable()
export class StructuredLogger implements LoggerService {
  private readonly threshold: number;

  constructor(minLevel: EnvConfig['LOG_LEVEL'] = 'info') {
    this.threshold = SEVERITY[minLevel];
  }

  log(message: string, context?: string): void {
    this.write('info', message, context);
  }

  error(message: unknown, trace?: string, context?: string): void {
    const msg = message instanceof Error ? message.message : String(message);
    const stack = message instanceof Error ? message.stack : trace;
    this.write('error', msg, context, { trace: stack });
  }

  warn(message: string, context?: string): void {
    this.write('warn', message, context);
  }

  debug(message: string, context?: string): void {
    this.write('debug', message, context);
  }

  verbose(message: string, context?: string): void {
    this.write('verbose', message, context);
  }

  private write(
    level: Level,
    message: string,
    context?: string,
    extra?: Record<string, unknown>,
  ): void {
    if (SEVERITY[level] < this.threshold) {
      return;
    }
    const store = correlationStorage.getStore();
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      correlationId: store?.correlationId ?? 'no-context',
      ...(store?.tenantId && { tenantId: store.tenantId }),
      context: context ?? 'Application',
      message,
      ...extra,
    };
    process.stdout.write(JSON.stringify(entry) + '\n');
  }
}
