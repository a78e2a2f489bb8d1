import { promises as fs } from 'fs';
import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from '../src/app';
import { FALLBACK_PROGRAM } from '../src/services/program-catalog.service';
import type { ProviderGateway } from '../src/services/provider/types';
import { RequestError } from '../src/utils/errors';
import { FakeGateway, createTestHarness, makeTempDir, ok, scriptedRunner } from './helpers';

interface SseEvent {
    event: string;
    data: Record<string, unknown>;
}

function parseSse(body: string): SseEvent[] {
    return body
        .split('\n\n')
        .filter((block) => block.trim().length > 0)
        .map((block) => {
            const lines = block.split('\n');
            const event = lines.find((line) => line.startsWith('event: '))?.slice('event: '.length) ?? '';
            const data: unknown = JSON.parse(lines.find((line) => line.startsWith('data: '))?.slice('data: '.length) ?? '{}');
            if (typeof data !== 'object' || data === null) {
                throw new Error(`unexpected SSE payload: ${block}`);
            }
            return { event, data: Object.fromEntries(Object.entries(data)) };
        });
}

describe('HTTP surface', () => {
    let root: string;
    let server: Server | undefined;

    beforeEach(async () => {
        root = await makeTempDir('routes');
    });

    afterEach(async () => {
        const running = server;
        server = undefined;
        if (running) {
            await new Promise<void>((resolve, reject) => running.close((error) => (error ? reject(error) : resolve())));
        }
        await fs.rm(root, { recursive: true, force: true });
    });

    async function start(gateways: ProviderGateway[], runner = scriptedRunner([])): Promise<string> {
        const harness = createTestHarness(root, gateways, runner);

        const listening = createApp(harness, 256).listen(0, '127.0.0.1');
        server = listening;
        await new Promise<void>((resolve) => listening.once('listening', () => resolve()));
        const address = listening.address();
        if (address === null || typeof address === 'string') {
            throw new Error('server is not listening on a TCP port');
        }
        return `http://127.0.0.1:${address.port}`;
    }

    const postJson = (url: string, body: unknown) =>
        fetch(url, { method: 'POST', headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(body) });

    it('reports health and registered backends', async () => {
        const base = await start([new FakeGateway('gpt', 'streaming', []), new FakeGateway('groq', 'single-shot', [])]);

        const response = await fetch(`${base}/health`);

        expect(await response.json()).toEqual({ status: 'ok', backends: ['gpt', 'groq'] });
    });

    it('lists example programs', async () => {
        const base = await start([]);

        const response = await fetch(`${base}/api/programs`);

        expect(await response.json()).toEqual({ programs: [FALLBACK_PROGRAM] });
    });

    it('streams a conversion as server-sent events', async () => {
        const gateway = new FakeGateway('gpt', 'streaming', ['```cpp\n', 'int main(){}', '\n```']);
        const base = await start([gateway]);

        const response = await postJson(`${base}/api/convert`, { sourceText: 'console.log(1)', backend: 'gpt' });
        const events = parseSse(await response.text());

        expect(response.headers.get('content-type')).toBe('text/event-stream');
        expect(events.map((event) => event.event)).toEqual(['start', 'token', 'token', 'token', 'done']);
        expect(events[0].data.backend).toBe('gpt');
        expect(events.slice(1, 4).map((event) => event.data)).toEqual([
            { chunk: '```cpp\n', code: '' },
            { chunk: 'int main(){}', code: 'int main(){}' },
            { chunk: '\n```', code: 'int main(){}' },
        ]);
        expect(events[4].data).toEqual({
            requestId: events[0].data.requestId,
            normalizedCode: 'int main(){}',
            path: `${root}/optimized_gpt.cpp`,
        });
        expect(gateway.requests[0].maxOutputTokens).toBe(256);
    });

    it('ends the stream with an error event when the backend fails', async () => {
        const failure = new RequestError('groq', 'groq request failed: Error: 503 Service Unavailable');
        const base = await start([new FakeGateway('groq', 'single-shot', [], failure)]);

        const response = await postJson(`${base}/api/convert`, { sourceText: 'let a;', backend: 'groq', maxOutputTokens: 9 });
        const events = parseSse(await response.text());

        expect(events.map((event) => event.event)).toEqual(['start', 'error']);
        expect(events[1].data.message).toBe('RequestError: groq request failed: Error: 503 Service Unavailable');
    });

    it('rejects invalid conversion input before streaming', async () => {
        const base = await start([new FakeGateway('gpt', 'streaming', ['int a;'])]);

        const blank = await postJson(`${base}/api/convert`, { sourceText: '   ', backend: 'gpt' });
        expect(blank.status).toBe(400);
        expect(await blank.json()).toEqual({ error: 'sourceText must not be empty' });

        const unknown = await postJson(`${base}/api/convert`, { sourceText: 'x', backend: 'A' });
        expect(unknown.status).toBe(400);
        expect(await unknown.json()).toEqual({ error: expect.stringMatching(/^backend: /) });
    });

    it('compiles and runs edited code', async () => {
        const runner = scriptedRunner([ok(), ok('15')]);
        const base = await start([], runner);

        const response = await postJson(`${base}/api/verify`, { backend: 'gpt', code: 'int main(){}' });
        expect(response.status).toBe(200);
        expect(await response.json()).toMatchObject({ output: '15', report: { status: 'completed' } });
        expect(await fs.readFile(`${root}/optimized_gpt.cpp`, 'utf-8')).toBe('int main(){}');
    });

    it('verifies the stored artifact when no code is sent', async () => {
        const runner = scriptedRunner([ok(), ok('stored')]);
        const base = await start([], runner);
        await fs.writeFile(`${root}/optimized_groq.cpp`, 'int main(){ return 0; }');

        const response = await postJson(`${base}/api/verify`, { backend: 'groq' });

        expect(response.status).toBe(200);
        expect(await response.json()).toMatchObject({ output: 'stored', report: { status: 'completed' } });
        expect(runner.calls[0].args.at(-1)).toBe(`${root}/optimized_groq.cpp`);
    });

    it('rejects verification when nothing is stored for the backend', async () => {
        const base = await start([]);

        const response = await postJson(`${base}/api/verify`, { backend: 'groq' });

        expect(response.status).toBe(400);
        expect(await response.json()).toEqual({ error: 'No artifact stored for backend "groq"' });
    });

    it('rejects verification with empty code', async () => {
        const base = await start([]);

        const response = await postJson(`${base}/api/verify`, { backend: 'gpt', code: '' });

        expect(response.status).toBe(400);
        expect(await response.json()).toEqual({ error: 'code: code must not be empty' });
    });

    it('evaluates the reference program', async () => {
        const base = await start([]);

        const response = await postJson(`${base}/api/reference`, { sourceText: 'console.log(3 * 5)' });

        expect(await response.json()).toEqual({ stdout: '15\n' });
    });
});
