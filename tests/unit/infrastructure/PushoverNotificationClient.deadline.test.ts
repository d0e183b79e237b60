import http from 'http';
import { PushoverNotificationClient } from '../../../src/infrastructure/notifications/PushoverNotificationClient';

/**
 * Runs against an in-process server, since nock's delay() only holds back
 * the response headers.
 */
describe('PushoverNotificationClient - request deadline', () => {
    const timers = new Set<NodeJS.Timeout>();
    let server: http.Server;
    let apiUrl: string;

    beforeAll(async () => {
        server = http.createServer((req, res) => {
            req.resume();
            req.on('end', () => {
                res.writeHead(200, { 'Content-Type': 'application/json' });
                const payload = '{"status":1,"request":"trickle"}';
                let sent = 0;
                const timer = setInterval(() => {
                    if (sent >= payload.length) {
                        clearInterval(timer);
                        timers.delete(timer);
                        res.end();
                        return;
                    }
                    res.write(payload[sent]);
                    sent++;
                }, 60);
                timers.add(timer);
                res.on('close', () => {
                    clearInterval(timer);
                    timers.delete(timer);
                });
            });
        });
        await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
        const address = server.address();
        if (address === null || typeof address === 'string') {
            throw new Error('Expected a TCP address');
        }
        apiUrl = `http://127.0.0.1:${address.port}/1/messages.json`;
    });

    afterAll(async () => {
        timers.forEach(timer => clearInterval(timer));
        server.closeAllConnections();
        await new Promise<void>(resolve => server.close(() => resolve()));
    });

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should fail at the timeout when the body arrives one byte at a time', async () => {
        const client = new PushoverNotificationClient('test-user-key', 'test-app-token', { apiUrl, timeoutMs: 300 });

        const startedAt = Date.now();
        const result = await client.notify('Hello');
        const elapsed = Date.now() - startedAt;

        expect(result).toEqual({
            success: false,
            detail: 'network error: request timed out after 300ms',
            failure: 'transport',
        });
        expect(elapsed).toBeLessThan(1500);
    });

    it('should succeed when the trickled body finishes inside the timeout', async () => {
        const client = new PushoverNotificationClient('test-user-key', 'test-app-token', { apiUrl, timeoutMs: 4000 });

        const result = await client.notify('Hello');

        expect(result).toEqual({ success: true, detail: 'success', requestId: 'trickle' });
    });
});
