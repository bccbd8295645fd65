import express, { Request, Response, NextFunction, RequestHandler } from 'express';
import cors from 'cors';
import path from 'path';
import { DashboardService } from './services/DashboardService';
import { criteriaFromQuery } from './services/FilterPipeline';
import { DashboardError, ParseError } from './errors';

export interface ErrorResponse {
    status: number;
    body: Record<string, unknown>;
}

// Body-parser and other middleware errors carry their own 4xx status.
function clientErrorStatus(error: unknown): number | undefined {
    if (error instanceof DashboardError || typeof error !== 'object' || error === null || !('status' in error)) {
        return undefined;
    }
    const { status } = error;
    return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function toErrorResponse(error: unknown): ErrorResponse {
    if (error instanceof ParseError) {
        return {
            status: 422,
            body: {
                error: error.message,
                rowErrors: error.rowErrors,
                parsedRows: error.parsedRows,
                totalRows: error.totalRows,
            },
        };
    }
    const status = clientErrorStatus(error);
    if (status !== undefined) {
        return { status, body: { error: error instanceof Error ? error.message : 'Bad request' } };
    }
    return { status: 500, body: { error: 'Failed to build dashboard' } };
}

function sendError(res: Response, error: unknown, context: string): void {
    const { status, body } = toErrorResponse(error);
    if (status >= 500) {
        console.error(`[SERVER] ${context}:`, error);
    }
    res.status(status).json(body);
}

export function createApp(service: DashboardService): express.Express {
    const app = express();

    app.use(cors());
    app.use(express.json());

    // Serve the dashboard page from 'public'
    app.use(express.static(path.join(__dirname, '../public')));

    app.get('/', (req, res) => {
        res.sendFile(path.join(__dirname, '../public/index.html'));
    });

    app.get('/api/health', (req, res) => {
        res.json(service.health());
    });

    app.get('/api/dashboard', (async (req: Request, res: Response) => {
        try {
            res.json(await service.getDashboard(criteriaFromQuery(req.query)));
        } catch (error) {
            sendError(res, error, 'Error building dashboard');
        }
    }) as RequestHandler);

    app.post(
        '/api/dashboard/upload',
        express.text({ type: ['text/csv', 'text/plain', 'application/csv'], limit: '10mb' }),
        (async (req: Request, res: Response) => {
            const body: unknown = req.body;
            if (typeof body !== 'string' || body.trim() === '') {
                return res.status(400).json({ error: 'Expected a CSV request body' });
            }
            try {
                res.json(await service.getDashboard(criteriaFromQuery(req.query), body));
            } catch (error) {
                sendError(res, error, 'Error loading upload');
            }
        }) as RequestHandler
    );

    app.post('/api/refresh', (async (req: Request, res: Response) => {
        service.refresh();
        try {
            res.json(await service.getDashboard(criteriaFromQuery(req.query)));
        } catch (error) {
            sendError(res, error, 'Error refreshing dashboard');
        }
    }) as RequestHandler);

    app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
        if (res.headersSent) {
            return next(error);
        }
        sendError(res, error, 'Unhandled error');
    });

    return app;
}
