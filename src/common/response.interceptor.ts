import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { map } from 'rxjs/operators';

export interface SuccessBody<T> {
  success: true;
  data: T;
}

@Injectable()
export class ResponseInterceptor<T> implements NestInterceptor<T, SuccessBody<T> | T> {
  intercept(_context: ExecutionContext, next: CallHandler<T>): Observable<SuccessBody<T> | T> {
    return next.handle().pipe(
      map((data) => {
        // If already in standardized shape, pass through
        if (data && typeof data === 'object' && Object.prototype.hasOwnProperty.call(data, 'success')) {
          return data;
        }

        return { success: true as const, data };
      }),
    );
  }
}
