import type { StreamState } from '../../types/response';

export class ResponseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ResponseError';
    }
}

/**
 * Raised when a chunk stream is iterated after it was already claimed.
 * Returning an empty sequence here would hide the bug from the caller.
 */
export class StreamReuseError extends ResponseError {
    constructor(public readonly state: StreamState) {
        super(StreamReuseError.describe(state));
        this.name = 'StreamReuseError';
    }

    private static describe(state: StreamState): string {
        switch (state) {
            case 'exhausted':
                return 'The stream has been processed already. Read the settled text with getText() instead.';
            case 'abandoned':
                return 'The stream was abandoned before completion; its text and tool invocations were never settled.';
            case 'open':
                return 'The stream is already being iterated by another consumer.';
            default:
                return `The stream cannot be iterated in state "${state}".`;
        }
    }
}

export class MalformedToolArgumentsError extends ResponseError {
    constructor(
        public readonly index: number,
        public readonly toolName: string,
        public readonly rawArguments: string,
        public readonly parseError?: unknown
    ) {
        super(`Tool call at index ${index} ("${toolName}") has malformed arguments: ${MalformedToolArgumentsError.reason(parseError)}`);
        this.name = 'MalformedToolArgumentsError';
    }

    private static reason(parseError: unknown): string {
        return parseError instanceof Error ? parseError.message : 'not valid JSON';
    }
}

export class InvalidChunkError extends ResponseError {
    constructor(
        message: string,
        public readonly validationErrors: Array<{ path: string; message: string }> = []
    ) {
        super(message);
        this.name = 'InvalidChunkError';
    }
}
