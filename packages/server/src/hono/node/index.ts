import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { Logger } from '@tasklane/core';
import type { TasklaneApp } from '../types.js';

const MAX_BODY_SIZE = 10 * 1024 * 1024; // 10MB limit

export type NodeBridgeOptions = {
    logger: Logger;
    port?: number;
    hostname?: string;
};

export type NodeBridgeResult = {
    server: Server;
};

class PayloadTooLargeError extends Error {
    constructor() {
        super('Payload too large');
        this.name = 'PayloadTooLargeError';
    }
}

export function createNodeServer(app: TasklaneApp, options: NodeBridgeOptions): NodeBridgeResult {
    const { logger } = options;

    const server = createServer(async (req, res) => {
        try {
            const request = await toRequest(req);
            const response = await app.fetch(request);
            await sendNodeResponse(res, response);
        } catch (error) {
            if (error instanceof PayloadTooLargeError) {
                res.statusCode = 413;
                res.end(error.message);
                return;
            }
            const message = error instanceof Error ? error.message : String(error);
            logger.error(`Unhandled error in Node bridge: ${message}`, { url: req.url });
            res.statusCode = 500;
            res.end('Internal Server Error');
        }
    });

    if (typeof options.port === 'number') {
        const hostname = options.hostname ?? '0.0.0.0';
        server.listen(options.port, hostname, () => {
            logger.info(`Hono Node bridge listening on http://${hostname}:${options.port}`);
        });
    }

    return { server };
}

function readBody(req: IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
        req.setEncoding('utf8');
        let body = '';
        req.on('data', (chunk: string) => {
            body += chunk;
            if (body.length > MAX_BODY_SIZE) {
                req.destroy();
                reject(new PayloadTooLargeError());
            }
        });
        req.on('end', () => resolve(body));
        req.on('error', reject);
    });
}

async function toRequest(req: IncomingMessage): Promise<Request> {
    const protocol = 'encrypted' in req.socket && req.socket.encrypted ? 'https' : 'http';
    const host = req.headers.host ?? 'localhost';
    const url = new URL(req.url ?? '/', `${protocol}://${host}`);

    const headers = new Headers();
    for (const [key, value] of Object.entries(req.headers)) {
        if (value === undefined) continue;
        if (Array.isArray(value)) {
            value.forEach((entry) => headers.append(key, entry));
        } else {
            headers.set(key, value);
        }
    }

    const method = req.method ?? 'GET';
    if (method === 'GET' || method === 'HEAD') {
        return new Request(url, { method, headers });
    }

    const body = await readBody(req);
    return new Request(url, { method, headers, body });
}

async function sendNodeResponse(res: ServerResponse, response: Response): Promise<void> {
    res.statusCode = response.status;
    response.headers.forEach((value, key) => {
        if (key.toLowerCase() === 'content-length') {
            return;
        }
        res.setHeader(key, value);
    });

    if (!response.body) {
        res.end();
        return;
    }

    res.end(Buffer.from(await response.arrayBuffer()));
}
