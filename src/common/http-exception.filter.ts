import { ExceptionFilter, Catch, ArgumentsHost, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { I18nService, TranslationVars } from '../i18n/i18n.service';

/** Structured exception body: `{ key: 'translation.key', vars, details }`. */
export interface KeyedErrorBody {
    key: string;
    vars?: TranslationVars;
    details?: unknown;
}

type ErrorMessage = string | string[] | KeyedErrorBody;

export interface ErrorResponse {
    statusCode: number;
    body: {
        success: false;
        error: { statusCode: number; message: string | string[]; details?: unknown };
    };
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
    private readonly logger = new Logger(HttpExceptionFilter.name);

    constructor(private readonly i18n: I18nService) { }

    catch(exception: unknown, host: ArgumentsHost) {
        const ctx = host.switchToHttp();
        const response = ctx.getResponse<Response>();
        const request = ctx.getRequest<Request>();

        const { statusCode, body } = this.buildErrorResponse(
            exception,
            request.headers['accept-language'],
            `${request.method} ${request.url}`,
        );
        response.status(statusCode).json(body);
    }

    buildErrorResponse(exception: unknown, acceptLanguage: string | string[] | undefined, route: string): ErrorResponse {
        let status = HttpStatus.INTERNAL_SERVER_ERROR;
        let message: ErrorMessage = { key: 'errors.internal' };

        if (exception instanceof HttpException) {
            status = exception.getStatus();
            message = messageOf(exception.getResponse(), exception.message);
        } else {
            this.logger.error(
                `Unhandled error on ${route}`,
                exception instanceof Error ? exception.stack : String(exception),
            );
        }

        const locale = localeOf(acceptLanguage);

        let translated: string | string[];
        let details: unknown;
        if (typeof message === 'object' && !Array.isArray(message)) {
            translated = this.i18n.t(message.key, locale, message.vars);
            details = message.details;
        } else if (typeof message === 'string' && !message.includes(' ')) {
            translated = this.i18n.t(message, locale);
        } else {
            translated = message;
        }

        return {
            statusCode: status,
            body: {
                success: false,
                error: {
                    statusCode: status,
                    message: translated,
                    ...(details !== undefined ? { details } : {}),
                },
            },
        };
    }
}

function messageOf(body: string | object, fallback: string): ErrorMessage {
    if (typeof body === 'string') return body;
    if (isKeyedBody(body)) return body;

    // ValidationPipe and plain Nest exceptions: { message, error, statusCode }
    if ('message' in body) {
        const { message } = body;
        if (typeof message === 'string') return message;
        if (Array.isArray(message) && message.every((m): m is string => typeof m === 'string')) return message;
    }
    if ('error' in body && typeof body.error === 'string') return body.error;
    return fallback;
}

function isKeyedBody(body: object): body is KeyedErrorBody {
    return 'key' in body && typeof body.key === 'string';
}

function localeOf(header: string | string[] | undefined): string {
    const accept = (Array.isArray(header) ? header[0] : header) || 'en';
    return accept.split(',')[0].split('-')[0].trim().toLowerCase() || 'en';
}
