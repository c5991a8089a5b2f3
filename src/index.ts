// Response envelope
export { ModelResponse } from './core/response/ModelResponse';
export type { ModelResponseSummary } from './core/response/ModelResponse';

// Streaming
export { StreamDecoder } from './core/response/StreamDecoder';
export { ClaimedStream } from './core/response/StreamDecoder';
export type { StreamDecoderSink, StreamDecoderOptions } from './core/response/StreamDecoder';
export { ToolCallAccumulator } from './core/response/ToolCallAccumulator';

// Chunk construction and validation
export { textChunk, structuredChunk, toolCallFragment } from './core/response/chunks';
export { parseChunk, parseChunkStream, RawChunkSchema } from './core/response/schemas';
export type { RawChunk } from './core/response/schemas';

// Errors
export {
    ResponseError,
    StreamReuseError,
    MalformedToolArgumentsError,
    InvalidChunkError
} from './core/response/errors';

// Types
export type {
    JsonValue,
    ToolCallFragment,
    TextChunk,
    StructuredChunk,
    ResponseChunk,
    ChunkSource,
    ToolInvocation,
    StreamProgress,
    StreamState,
    SettledResponse,
    ModelResponseOptions
} from './types/response';

// Utilities
export { isJsonSerializable } from './utils/typeGuards';
export { Logger, logger } from './utils/logger';
export type { LogLevel, LoggerConfig } from './utils/logger';
export { config, loadConfig } from './config/config';
export type { ModelResponseConfig } from './config/config';
