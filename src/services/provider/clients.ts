// src/services/provider/clients.ts
// Thin adapters from the vendor SDKs to the completion function shapes the gateways consume.

import OpenAI from 'openai';
import Groq from 'groq-sdk';
import type { ChatMessage, SingleShotCompletion, StreamingCompletion } from './types';

const toSdkMessages = (messages: ChatMessage[]) =>
    messages.map((message) =>
        message.role === 'system'
            ? { role: 'system' as const, content: message.content }
            : { role: 'user' as const, content: message.content },
    );

export function openAIStreamingCompletion(client: OpenAI): StreamingCompletion {
    return async ({ model, messages }, signal) =>
        client.chat.completions.create(
            {
                model,
                messages: toSdkMessages(messages),
                stream: true,
            },
            { signal },
        );
}

export function groqSingleShotCompletion(client: Groq): SingleShotCompletion {
    return async ({ model, messages, maxTokens }, signal) =>
        client.chat.completions.create(
            {
                model,
                messages: toSdkMessages(messages),
                max_tokens: maxTokens,
                temperature: 0,
                stream: false,
            },
            { signal },
        );
}
