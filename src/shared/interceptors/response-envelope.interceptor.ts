import {
  CallHandler,
  ExecutionContext,
  HttpException,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Observable, map } from 'rxjs';
import { IResponse } from '../interfaces';

export const isResponseEnvelope = (body: unknown): body is IResponse =>
  typeof body === 'object' &&
  body !== null &&
  'status' in body &&
  typeof body.status === 'number' &&
  'message' in body &&
  typeof body.message === 'string';

/**
 * Services answer with `{ status, message, ... }` envelopes instead of throwing.
 * Failed envelopes are raised as HttpExceptions so the HTTP status code matches
 * the envelope while the body stays unchanged.
 */
@Injectable()
export class ResponseEnvelopeInterceptor implements NestInterceptor {
  intercept(_context: ExecutionContext, next: CallHandler): Observable<unknown> {
    return next.handle().pipe(
      map((body: unknown) => {
        if (isResponseEnvelope(body) && body.status >= 400) {
          throw new HttpException(body, body.status);
        }
        return body;
      }),
    );
  }
}
