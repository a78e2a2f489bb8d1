// src/routes/convert.ts

import express, { type Request, type Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { backendSchema, createConversionRequest } from '../models/conversion.model';
import type { ArtifactStore } from '../services/artifact-store.service';
import type { ConversionService } from '../services/conversion.service';
import type { ProgramCatalogService } from '../services/program-catalog.service';
import { normalizeCode } from '../services/response-aggregator.service';
import { describeReport, type CompileExecuteSandbox } from '../services/sandbox/compile-execute.service';
import type { ReferenceSandbox } from '../services/sandbox/reference.service';
import { InputError, describeError } from '../utils/errors';

export interface ConvertRouterDeps {
    conversionService: ConversionService;
    artifactStore: ArtifactStore;
    sandbox: CompileExecuteSandbox;
    referenceSandbox: ReferenceSandbox;
    programCatalog: ProgramCatalogService;
    defaultMaxTokens: number;
}

const convertBodySchema = z.object({
    sourceText: z.string(),
    backend: backendSchema,
    maxOutputTokens: z.number().int().positive().optional(),
});

const verifyBodySchema = z.object({
    backend: backendSchema,
    /** Omitted: verify the artifact already stored for the backend. */
    code: z.string().min(1, 'code must not be empty').optional(),
});

const referenceBodySchema = z.object({
    sourceText: z.string(),
});

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
        throw new InputError(parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '));
    }
    return parsed.data;
}

function sendError(res: Response, error: unknown): void {
    if (error instanceof InputError) {
        res.status(400).json({ error: error.message });
        return;
    }
    res.status(500).json({ error: error instanceof Error ? error.message : describeError(error) });
}

export function createConvertRouter(deps: ConvertRouterDeps): express.Router {
    const router = express.Router();

    router.get('/programs', async (_req: Request, res: Response) => {
        try {
            res.json({ programs: await deps.programCatalog.list() });
        } catch (error: unknown) {
            sendError(res, error);
        }
    });

    router.post('/convert', async (req: Request, res: Response) => {
        const requestId = uuidv4();
        const controller = new AbortController();
        let streaming = false;

        try {
            const body = parseBody(convertBodySchema, req.body);
            const request = createConversionRequest({
                sourceText: body.sourceText,
                backend: body.backend,
                maxOutputTokens: body.maxOutputTokens ?? deps.defaultMaxTokens,
            });

            res.on('close', () => {
                if (!res.writableEnded) {
                    controller.abort();
                }
            });
            prepareSseHeaders(res);
            streaming = true;
            sendSse(res, 'start', { requestId, backend: request.backend });

            const { result, artifact } = await deps.conversionService.convertAndVerify(request, {
                signal: controller.signal,
                onFragment: (fragment, accumulatedRaw) => {
                    sendSse(res, 'token', { chunk: fragment.text, code: normalizeCode(accumulatedRaw) });
                },
            });
            sendSse(res, 'done', { requestId, normalizedCode: result.normalizedCode, path: artifact.path });
            res.end();
        } catch (error: unknown) {
            if (!streaming) {
                sendError(res, error);
                return;
            }
            sendSse(res, 'error', { requestId, message: describeError(error) });
            res.end();
        }
    });

    router.post('/verify', async (req: Request, res: Response) => {
        try {
            const { backend, code } = parseBody(verifyBodySchema, req.body);
            const artifact =
                code === undefined ? await deps.artifactStore.read(backend) : await deps.artifactStore.write(code, backend);
            if (!artifact) {
                throw new InputError(`No artifact stored for backend "${backend}"`);
            }
            const report = await deps.sandbox.run(artifact);
            res.json({ report, output: describeReport(report) });
        } catch (error: unknown) {
            sendError(res, error);
        }
    });

    router.post('/reference', async (req: Request, res: Response) => {
        try {
            const { sourceText } = parseBody(referenceBodySchema, req.body);
            res.json(await deps.referenceSandbox.evaluate(sourceText));
        } catch (error: unknown) {
            sendError(res, error);
        }
    });

    return router;
}

function prepareSseHeaders(res: Response): void {
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache, no-transform');
    res.setHeader('Connection', 'keep-alive');
    if (typeof res.flushHeaders === 'function') {
        res.flushHeaders();
    }
}

function sendSse(res: Response, event: string, data: unknown): void {
    res.write(`event: ${event}\n`);
    res.write(`data: ${JSON.stringify(data)}\n\n`);
}
