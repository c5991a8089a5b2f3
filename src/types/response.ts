/*
 Types shared by the response envelope and the stream decoder.

 Chunks reach the decoder already resolved into one of two tagged shapes,
 so nothing downstream has to probe for `.text` or `.tool_calls` at runtime.
*/

export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

/**
 * Partial tool invocation as streamed by a backend
 */
export type ToolCallFragment = {
    index: number; // Identifies the in-progress invocation, stable across chunks
    id?: string; // Usually only on the first fragment for an index
    type?: string; // Vendor-defined kind, passed through untouched
    function?: {
        name?: string;
        arguments?: string; // Piece of a JSON string, concatenated in arrival order
    };
};

export type TextChunk = {
    type: 'text';
    text: string;
};

export type StructuredChunk = {
    type: 'structured';
    text: string; // Delta since the previous chunk; empty for tool-call-only chunks
    toolCallFragments?: ToolCallFragment[];
};

export type ResponseChunk = TextChunk | StructuredChunk;

export type ChunkSource = AsyncIterable<ResponseChunk> | Iterable<ResponseChunk>;

export type ToolInvocation = {
    type: 'tool_use';
    id: string;
    name: string;
    input: JsonValue;
};

/**
 * One item of the incremental view. Emission runs one chunk behind consumption,
 * so `isFinal` is only true for the item emitted after the source ended.
 */
export type StreamProgress = {
    isFinal: boolean;
    delta: string; // Text carried by the chunk this item stands for
    text: string; // Concatenation of every delta emitted so far, this one included
};

export type StreamState = 'unopened' | 'open' | 'exhausted' | 'abandoned';

export type SettledResponse = {
    text: string | undefined;
    toolInvocations: ToolInvocation[];
};

export type ModelResponseOptions<TParsed = unknown, TRaw = unknown> = {
    text?: string;
    embedding?: number[];
    imageUrls?: string[];
    raw?: TRaw;
    parsed?: TParsed;
    stream?: ChunkSource;
    toolInvocations?: ToolInvocation[];
    /** Overrides config.response.repairToolArguments for this response */
    repairToolArguments?: boolean;
};
