import http from 'http';
import net from 'net';
import { parseJsonBody, sendJson, sendJsonError } from '../../src/lib/request-utils';

// IncomingMessage is a Readable; pushing the body and then null ends the stream
const createMockIncomingMessage = (body: string): http.IncomingMessage => {
    const req = new http.IncomingMessage(new net.Socket());
    req.method = 'POST';
    req.url = '/';
    req.push(body);
    req.push(null);
    return req;
};

const createMockServerResponse = () => {
    const res = {
        statusCode: 0,
        setHeader: jest.fn(),
        end: jest.fn(),
    };
    return res;
};

describe('request-utils', () => {
    describe('parseJsonBody', () => {
        test('should parse a valid JSON body', async () => {
            const req = createMockIncomingMessage(JSON.stringify({ message: 'Hello $x$', images: {} }));
            await expect(parseJsonBody(req)).resolves.toEqual({ message: 'Hello $x$', images: {} });
        });

        test('should decode a multi-byte character split across two chunks', async () => {
            const bytes = Buffer.from(JSON.stringify({ message: 'x \u2211 y' }), 'utf-8');
            // The sum sign is three bytes; split after its first byte.
            const splitAt = bytes.indexOf(0xe2) + 1;
            const req = new http.IncomingMessage(new net.Socket());
            req.push(bytes.subarray(0, splitAt));
            req.push(bytes.subarray(splitAt));
            req.push(null);

            await expect(parseJsonBody(req)).resolves.toEqual({ message: 'x \u2211 y' });
        });

        test('should reject with an error for an invalid JSON body', async () => {
            const req = createMockIncomingMessage('this is not json');
            await expect(parseJsonBody(req)).rejects.toThrow('Invalid JSON body');
        });

        test('should reject with an error for an empty body (invalid JSON)', async () => {
            const req = createMockIncomingMessage('');
            await expect(parseJsonBody(req)).rejects.toThrow('Invalid JSON body');
        });
    });

    describe('sendJson', () => {
        test('should write the status, content type and serialized payload', () => {
            const res = createMockServerResponse();
            sendJson(res as unknown as http.ServerResponse, 200, { blocks: [{ type: 'text', text: 'hi' }] });

            expect(res.statusCode).toBe(200);
            expect(res.setHeader).toHaveBeenCalledWith('Content-Type', 'application/json');
            expect(res.end).toHaveBeenCalledWith('{"blocks":[{"type":"text","text":"hi"}]}');
        });
    });

    describe('sendJsonError', () => {
        test('should send an error without detail', () => {
            const res = createMockServerResponse();
            sendJsonError(res as unknown as http.ServerResponse, 404, 'Not found');

            expect(res.statusCode).toBe(404);
            expect(JSON.parse(res.end.mock.calls[0][0])).toEqual({ error: 'Not found' });
        });

        test('should include the detail when given', () => {
            const res = createMockServerResponse();
            sendJsonError(res as unknown as http.ServerResponse, 400, 'Invalid JSON body provided.', 'Invalid JSON body');

            expect(res.statusCode).toBe(400);
            expect(JSON.parse(res.end.mock.calls[0][0])).toEqual({
                error: 'Invalid JSON body provided.',
                detail: 'Invalid JSON body',
            });
        });
    });
});
