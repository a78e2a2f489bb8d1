// src/services/provider/streaming.gateway.ts

import { z } from 'zod';
import type { ConversionRequest } from '../../models/conversion.model';
import { GatewayBase, type GatewayConfig } from './gateway.base';
import { buildConversionMessages } from './prompts/conversionPrompt';
import type { StreamingCompletion } from './types';

const streamChunkSchema = z.object({
    choices: z.array(
        z.object({
            delta: z.object({ content: z.string().nullish() }).optional(),
        }),
    ),
});

/** Backends that push partial text as it is generated. */
export class StreamingGateway extends GatewayBase {
    readonly style = 'streaming' as const;

    constructor(config: GatewayConfig, private readonly openStream: StreamingCompletion) {
        super(config);
    }

    protected async *generate(request: ConversionRequest, signal: AbortSignal): AsyncIterable<string> {
        const stream = await this.openStream(
            { model: this.model, messages: buildConversionMessages(request.sourceText) },
            signal,
        );

        for await (const chunk of stream) {
            const parsed = streamChunkSchema.safeParse(chunk);
            if (!parsed.success) {
                throw this.malformed(parsed.error.issues.map((issue) => issue.message).join('; '));
            }
            // Usage-only chunks carry an empty choices array.
            const content = parsed.data.choices[0]?.delta?.content;
            if (content) {
                yield content;
            }
        }
    }
}
