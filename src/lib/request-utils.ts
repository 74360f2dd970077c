import http from 'http';

// Helper function to parse JSON body from IncomingMessage
export async function parseJsonBody(req: http.IncomingMessage): Promise<unknown> {
    return new Promise((resolve, reject) => {
        // A multi-byte character may span two chunks, so decode only after concatenating.
        const chunks: Buffer[] = [];
        req.on('data', (chunk: Buffer | string) => {
            chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
        });
        req.on('end', () => {
            try {
                resolve(JSON.parse(Buffer.concat(chunks).toString('utf-8')));
            } catch (e) {
                reject(new Error('Invalid JSON body'));
            }
        });
        req.on('error', reject);
    });
}

export function sendJson(res: http.ServerResponse, statusCode: number, payload: unknown): void {
    res.statusCode = statusCode;
    res.setHeader('Content-Type', 'application/json');
    res.end(JSON.stringify(payload));
}

export function sendJsonError(
    res: http.ServerResponse,
    statusCode: number,
    error: string,
    detail?: string
): void {
    const responseBody: { error: string; detail?: string } = { error };
    if (detail) {
        responseBody.detail = detail;
    }
    sendJson(res, statusCode, responseBody);
}
