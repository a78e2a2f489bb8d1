// src/services/response-aggregator.service.ts

import { BaseService } from './base/BaseService';
import type { BackendId, ConversionResult, Fragment } from '../models/conversion.model';
import { RequestError } from '../utils/errors';

export const CODE_FENCE_OPEN = '```cpp';
export const CODE_FENCE_CLOSE = '```';

/** Called for every fragment as it arrives, with the raw text accumulated so far. */
export type FragmentObserver = (fragment: Fragment, accumulatedRaw: string) => void;

/**
 * Strips the code fence markers wherever they appear and trims the rest.
 * Text without markers passes through trimmed; malformed fencing is not an error.
 */
export function normalizeCode(raw: string): string {
    return raw.split(CODE_FENCE_OPEN).join('').split(CODE_FENCE_CLOSE).join('').trim();
}

export class ResponseAggregatorService extends BaseService {
    async aggregate(
        fragments: AsyncIterable<Fragment>,
        backend: BackendId,
        observer?: FragmentObserver,
    ): Promise<ConversionResult> {
        let rawText = '';
        let fragmentCount = 0;

        for await (const fragment of fragments) {
            rawText += fragment.text;
            fragmentCount++;
            observer?.(fragment, rawText);
        }

        if (rawText.length === 0) {
            throw new RequestError(backend, `${backend} returned an empty completion`);
        }

        const normalizedCode = normalizeCode(rawText);
        if (!rawText.includes(CODE_FENCE_OPEN)) {
            this.logger.warn('Completion has no opening code fence; passing text through', { backend });
        }
        this.logger.debug('Aggregated completion', {
            backend,
            fragmentCount,
            rawLength: rawText.length,
            codeLength: normalizedCode.length,
        });

        return {
            backend,
            rawText,
            normalizedCode,
            fragmentCount,
            producedAt: new Date(),
        };
    }
}
