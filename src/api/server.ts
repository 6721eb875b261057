/**
 * HTTP API
 *
 * Authentication belongs to the hosting platform; the authenticated user id
 * reaches us in the `x-user-id` header.
 *
 * Left results answer 400 with the list of problems. Thrown errors are
 * mapped by toHttpError and never expose backend messages.
 */
import {AppEffects} from '../pure/effects';
import {
    cancelScheduledMessage,
    createScheduledMessage,
    getDeliveryStats,
    getMessageCounts,
    getReceivedMessages,
    getScheduledMessages,
} from '../pure/messageProcessing';
import {createScheduledMessageWithMedia} from '../pure/mediaUpload';
import {processReadyMessages, retryFailedMessages} from '../pure/messageDelivery';
import {timeUntilDelivery} from '../pure/businessLogic';
import {ProfilePictureService} from '../cache/ProfilePictureService';
import {AppError, FatalCode, FatalError, RateLimitError, toUserMessage} from '../resilience/errors';
import {parseMediaFile, parseMessageRequest} from './requests';
import express, {Express, NextFunction, Request, RequestHandler, Response} from 'express';
import {Either, Left, NonEmptyList} from 'purify-ts';

export type HttpError = {
    readonly status: number;
    readonly body: { readonly error: string; readonly retryAfterSeconds?: number };
};

const FATAL_STATUS: Record<FatalCode, number> = {
    'permission-denied': 403,
    'unauthenticated': 401,
    'not-found': 404,
    'already-exists': 409,
    'internal': 500,
};

export function toHttpError(error: unknown): HttpError {
    if (error instanceof RateLimitError) {
        return {
            status: 429,
            body: {error: error.userMessage, retryAfterSeconds: Math.ceil(error.retryAfterMs / 1000)},
        };
    }
    if (error instanceof FatalError) {
        return {status: FATAL_STATUS[error.code], body: {error: error.userMessage}};
    }
    if (error instanceof AppError) {
        return {status: error.category === 'validation' ? 400 : 503, body: {error: error.userMessage}};
    }
    return {status: 500, body: {error: toUserMessage(error)}};
}

function requireUser(req: Request): string {
    const userId = req.header('x-user-id');
    if (!userId) {
        throw new FatalError('unauthenticated', 'Missing x-user-id header');
    }
    return userId;
}

/** Express 4 does not catch rejected handlers; hand them to the error middleware. */
function route(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
    return (req, res, next) => {
        handler(req, res).catch(next);
    };
}

function respond<T>(res: Response, result: Either<NonEmptyList<string>, T>, status = 200): void {
    result.caseOf({
        Left: (errors) => {
            res.status(400).json({errors});
        },
        Right: (value) => {
            res.status(status).json(value);
        },
    });
}

function ensureOwner(req: Request, userId: string): void {
    const requesterId = requireUser(req);
    if (requesterId !== userId) {
        throw new FatalError('permission-denied', `User ${requesterId} cannot change ${userId}'s profile`);
    }
}

export function createApiServer(effects: AppEffects, profilePictures: ProfilePictureService): Express {
    const app = express();

    // Attachments travel inline, so allow for a video
    app.use(express.json({limit: '150mb'}));

    app.get('/health', (req, res) => {
        res.json({status: 'healthy', service: 'time-capsule'});
    });

    /**
     * POST /api/messages
     *
     * Schedules a message; attachments, when present, are uploaded first.
     */
    app.post('/api/messages', route(async (req, res) => {
        const senderId = requireUser(req);
        const result = await parseMessageRequest(req.body, senderId)
            .caseOf<Promise<Either<NonEmptyList<string>, unknown>>>({
                Left: (errors) => Promise.resolve(Left(errors)),
                Right: ({draft, files}) => files.length > 0
                    ? createScheduledMessageWithMedia(draft, files)(effects)
                    : createScheduledMessage(draft)(effects),
            });
        respond(res, result, 201);
    }));

    app.get('/api/messages/scheduled', route(async (req, res) => {
        const now = effects.clock.now();
        const result = await getScheduledMessages(requireUser(req))(effects);
        respond(res, result.map(messages => messages.map(message => ({
            ...message,
            timeUntilDeliveryMs: timeUntilDelivery(message, now).extractNullable(),
        }))));
    }));

    app.get('/api/messages/received', route(async (req, res) => {
        respond(res, await getReceivedMessages(requireUser(req))(effects));
    }));

    app.get('/api/messages/counts', route(async (req, res) => {
        respond(res, await getMessageCounts(requireUser(req))(effects));
    }));

    app.get('/api/messages/stats', route(async (req, res) => {
        respond(res, await getDeliveryStats(requireUser(req))(effects));
    }));

    app.delete('/api/messages/:id', route(async (req, res) => {
        respond(res, await cancelScheduledMessage(req.params.id, requireUser(req))(effects));
    }));

    /**
     * POST /api/deliveries/run
     *
     * Runs one delivery sweep now instead of waiting for the next tick.
     */
    app.post('/api/deliveries/run', route(async (req, res) => {
        requireUser(req);
        res.json(await processReadyMessages()(effects));
    }));

    app.post('/api/deliveries/retry-failed', route(async (req, res) => {
        requireUser(req);
        res.json(await retryFailedMessages()(effects));
    }));

    app.get('/api/users/:id/profile-picture', route(async (req, res) => {
        requireUser(req);
        const userId = req.params.id;
        const url = await profilePictures.getProfilePictureUrl(userId, {
            forceRefresh: req.query.forceRefresh === 'true',
        });
        res.json({userId, url});
    }));

    app.put('/api/users/:id/profile-picture', route(async (req, res) => {
        const userId = req.params.id;
        ensureOwner(req, userId);
        const result = await parseMediaFile(req.body, 'Profile picture')
            .caseOf<Promise<Either<string, string>>>({
                Left: (reason) => Promise.resolve(Left(reason)),
                Right: (file) => profilePictures.updateProfilePicture(userId, file),
            });
        result.caseOf({
            Left: (reason) => {
                res.status(400).json({errors: [reason]});
            },
            Right: (url) => {
                res.json({userId, url});
            },
        });
    }));

    app.delete('/api/users/:id/profile-picture', route(async (req, res) => {
        const userId = req.params.id;
        ensureOwner(req, userId);
        await profilePictures.removeProfilePicture(userId);
        res.status(204).end();
    }));

    // Error middleware: Express recognises it by its four parameters
    app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
        const {status, body} = toHttpError(error);
        if (status >= 500) {
            console.error(`❌ ${req.method} ${req.path} failed:`, error);
        }
        if (body.retryAfterSeconds !== undefined) {
            res.setHeader('Retry-After', String(body.retryAfterSeconds));
        }
        res.status(status).json(body);
    });

    return app;
}

/**
 * Start listening; resolves once the port is bound.
 */
export function startApiServer(app: Express, port: number): Promise<void> {
    return new Promise((resolve) => {
        app.listen(port, () => {
            console.log(`🌐 API server started on port ${port}`);
            console.log(`   - Schedule message: POST http://localhost:${port}/api/messages`);
            console.log(`   - Run deliveries: POST http://localhost:${port}/api/deliveries/run`);
            console.log(`   - Health check: GET http://localhost:${port}/health`);
            console.log('');
            resolve();
        });
    });
}
