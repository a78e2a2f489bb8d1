// src/services/provider/index.ts

import OpenAI from 'openai';
import Groq from 'groq-sdk';
import type { Logger } from '../base/types';
import type { BackendId } from '../../models/conversion.model';
import { ConfigurationError } from '../../utils/errors';
import { groqSingleShotCompletion, openAIStreamingCompletion } from './clients';
import { SingleShotGateway } from './single-shot.gateway';
import { StreamingGateway } from './streaming.gateway';
import type { GatewayRegistry, ProviderGateway } from './types';

export interface GatewaySettings {
    OPENAI_API_KEY: string;
    GROQ_API_KEY: string;
    OPENAI_MODEL: string;
    GROQ_MODEL: string;
    REQUEST_TIMEOUT_MS: number;
}

const requireKey = (value: string, name: string): string => {
    if (!value.trim()) {
        throw new ConfigurationError(`${name} is required to reach the backend`);
    }
    return value.trim();
};

/**
 * Builds one gateway per backend. Call once at startup and pass the registry
 * to every consumer. Neither SDK client retries: a failed call fails the conversion.
 */
export function createGateways(settings: GatewaySettings, logger: Logger): GatewayRegistry {
    const openai = new OpenAI({ apiKey: requireKey(settings.OPENAI_API_KEY, 'OPENAI_API_KEY'), maxRetries: 0 });
    const groq = new Groq({ apiKey: requireKey(settings.GROQ_API_KEY, 'GROQ_API_KEY'), maxRetries: 0 });

    const gateways: ProviderGateway[] = [
        new StreamingGateway(
            { backend: 'gpt', model: settings.OPENAI_MODEL, defaultTimeoutMs: settings.REQUEST_TIMEOUT_MS, logger },
            openAIStreamingCompletion(openai),
        ),
        new SingleShotGateway(
            { backend: 'groq', model: settings.GROQ_MODEL, defaultTimeoutMs: settings.REQUEST_TIMEOUT_MS, logger },
            groqSingleShotCompletion(groq),
        ),
    ];

    logger.info('Backend gateways initialized', {
        backends: gateways.map((gateway) => `${gateway.backend}:${gateway.style}`),
    });
    return new Map<BackendId, ProviderGateway>(gateways.map((gateway) => [gateway.backend, gateway]));
}

export * from './types';
export { StreamingGateway } from './streaming.gateway';
export { SingleShotGateway } from './single-shot.gateway';
