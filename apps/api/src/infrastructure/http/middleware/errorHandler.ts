import type { Request, Response, NextFunction } from 'express';
import { AppError } from '../../../domain/errors/AppError';
import { ZodError } from 'zod';
import logger from '../../logger';

export const errorHandler = (
    err: Error,
    req: Request,
    res: Response,
    // Express recognises error handlers by their four parameters
    _next: NextFunction
): void => {
    if (err instanceof AppError) {
        const meta = { path: req.path, statusCode: err.statusCode, error: err.name };
        if (err.statusCode >= 500) {
            logger.error(err.message, { ...meta, cause: err.cause instanceof Error ? err.cause.message : err.cause });
        } else {
            logger.warn(err.message, meta);
        }

        res.status(err.statusCode).json({
            status: 'error',
            message: err.message,
        });
        return;
    }

    if (err instanceof ZodError) {
        logger.warn('Validation Error', { path: req.path, issues: err.issues.length });

        res.status(400).json({
            status: 'fail',
            message: 'Validation Error',
            errors: err.issues,
        });
        return;
    }

    logger.error(err);

    // Fallback for unhandled errors
    res.status(500).json({
        status: 'error',
        message: 'Internal Server Error',
    });
};
