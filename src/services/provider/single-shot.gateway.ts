// src/services/provider/single-shot.gateway.ts

import { z } from 'zod';
import type { ConversionRequest } from '../../models/conversion.model';
import { GatewayBase, type GatewayConfig } from './gateway.base';
import { buildConversionMessages } from './prompts/conversionPrompt';
import type { SingleShotCompletion } from './types';

const completionSchema = z.object({
    choices: z
        .array(
            z.object({
                message: z.object({ content: z.string() }),
            }),
        )
        .min(1, 'response has no choices'),
});

/** Backends that answer with the whole completion at once; wrapped as a one-fragment sequence. */
export class SingleShotGateway extends GatewayBase {
    readonly style = 'single-shot' as const;

    constructor(config: GatewayConfig, private readonly complete: SingleShotCompletion) {
        super(config);
    }

    protected async *generate(request: ConversionRequest, signal: AbortSignal): AsyncIterable<string> {
        const response = await this.complete(
            {
                model: this.model,
                messages: buildConversionMessages(request.sourceText),
                maxTokens: request.maxOutputTokens,
            },
            signal,
        );

        const parsed = completionSchema.safeParse(response);
        if (!parsed.success) {
            throw this.malformed(parsed.error.issues.map((issue) => issue.message).join('; '));
        }
        yield parsed.data.choices[0].message.content;
    }
}
