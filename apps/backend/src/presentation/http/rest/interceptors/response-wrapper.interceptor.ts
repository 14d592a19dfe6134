import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';

export interface SuccessEnvelope<T> {
  success: true;
  data: T;
}

@Injectable()
export class ResponseWrapperInterceptor implements NestInterceptor {
  intercept(_context: ExecutionContext, next: CallHandler<unknown>): Observable<unknown> {
    return next.handle().pipe(
      map((data) => {
        // Manual replies (health, metrics) return nothing
        if (data === undefined || data === null) {
          return data;
        }

        if (isEnvelope(data)) {
          return data;
        }

        const wrapped: SuccessEnvelope<unknown> = { success: true, data };
        return wrapped;
      }),
    );
  }
}

function isEnvelope(data: unknown): boolean {
  return (
    typeof data === 'object' &&
    data !== null &&
    'success' in data &&
    typeof data.success === 'boolean' &&
    ('data' in data || 'error' in data)
  );
}
