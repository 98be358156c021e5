// pattern: Functional Core

export type { AIResponse, ChatClient, ChatClientOptions, ChatOptions, InvokeOptions, InvokeResult } from './client.ts';
export { createChatClient, createChatClientFromConfig } from './client.ts';
