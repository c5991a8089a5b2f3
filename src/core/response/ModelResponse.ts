import type {
    ChunkSource,
    ModelResponseOptions,
    SettledResponse,
    StreamState,
    ToolInvocation
} from '../../types/response';
import { StreamDecoder } from './StreamDecoder';
import type { ClaimedStream } from './StreamDecoder';
import { ResponseError, StreamReuseError } from './errors';
import { isJsonSerializable } from '../../utils/typeGuards';
import { config } from '../../config/config';
import { logger } from '../../utils/logger';

export type ModelResponseSummary = {
    text: string | null;
    embedding: number[] | null;
    imageUrls: string[] | null;
    parsed: unknown;
    raw: unknown;
};

/**
 * Uniform result of a model call, whether the backend answered with text,
 * structured output, embeddings, images or a stream of chunks.
 *
 * A streamed response settles once: either while the caller walks iterate(),
 * or on the first getText()/settle() call, which drains the stream if nobody
 * has touched it yet.
 */
export class ModelResponse<TParsed = unknown, TRaw = unknown> {
    public embedding?: number[];
    public imageUrls?: string[];
    public raw?: TRaw;
    public parsed?: TParsed;

    private text?: string;
    private readonly toolInvocations: ToolInvocation[];
    private readonly decoder?: StreamDecoder;
    private log = logger.createLogger({ prefix: 'ModelResponse' });

    constructor(options: ModelResponseOptions<TParsed, TRaw> = {}) {
        this.text = options.text;
        this.embedding = options.embedding;
        this.imageUrls = options.imageUrls;
        this.raw = options.raw;
        this.parsed = options.parsed;
        this.toolInvocations = options.toolInvocations ? [...options.toolInvocations] : [];

        if (options.stream) {
            this.decoder = new StreamDecoder(
                options.stream,
                {
                    onText: text => {
                        this.text = text;
                    },
                    onToolInvocations: invocations => {
                        this.toolInvocations.push(...invocations);
                    }
                },
                { repairToolArguments: options.repairToolArguments ?? config.response.repairToolArguments }
            );
        }
    }

    static fromText<TParsed = unknown, TRaw = unknown>(
        text: string,
        options: Omit<ModelResponseOptions<TParsed, TRaw>, 'text' | 'stream'> = {}
    ): ModelResponse<TParsed, TRaw> {
        return new ModelResponse<TParsed, TRaw>({ ...options, text });
    }

    static fromStream<TParsed = unknown, TRaw = unknown>(
        stream: ChunkSource,
        options: Omit<ModelResponseOptions<TParsed, TRaw>, 'stream'> = {}
    ): ModelResponse<TParsed, TRaw> {
        return new ModelResponse<TParsed, TRaw>({ ...options, stream });
    }

    /**
     * Settled text. Drains the stream first if text was never supplied and the
     * stream is untouched; while the stream is open, returns what has been
     * observed so far without pulling.
     * @throws StreamReuseError if the stream was abandoned before completion
     */
    async getText(): Promise<string | undefined> {
        const decoder = this.decoder;
        this.assertNotAbandoned();
        if (this.text === undefined && decoder && decoder.getState() === 'unopened') {
            this.log.debug('Text requested before the stream was consumed, draining');
            await decoder.drain();
        }
        return this.text;
    }

    /**
     * Overrides the settled text. Bypasses the stream entirely.
     */
    setText(value: string): void {
        this.text = value;
    }

    getToolInvocations(): ToolInvocation[] {
        return [...this.toolInvocations];
    }

    /**
     * Drains an untouched stream and returns the settled text and tool invocations
     * @throws StreamReuseError if the stream was abandoned before completion
     */
    async settle(): Promise<SettledResponse> {
        const decoder = this.decoder;
        this.assertNotAbandoned();
        if (decoder && decoder.getState() === 'unopened') {
            await decoder.drain();
        }
        return {
            text: this.text,
            toolInvocations: this.getToolInvocations()
        };
    }

    hasStream(): boolean {
        return this.decoder !== undefined;
    }

    isExhausted(): boolean {
        return this.decoder?.isExhausted() ?? false;
    }

    getStreamState(): StreamState {
        return this.decoder?.getState() ?? 'unopened';
    }

    /**
     * Incremental view of the stream. Can be claimed once.
     * @throws ResponseError if the response carries no stream
     * @throws StreamReuseError if the stream was already claimed
     */
    iterate(): ClaimedStream {
        if (!this.decoder) {
            throw new ResponseError('This response does not carry a stream');
        }
        return this.decoder.iterate();
    }

    // Text left behind by a stream that stopped early is not a settled value
    private assertNotAbandoned(): void {
        if (this.decoder?.getState() === 'abandoned') {
            throw new StreamReuseError('abandoned');
        }
    }

    toJSON(): ModelResponseSummary {
        return {
            text: this.text ?? null,
            embedding: this.embedding ?? null,
            imageUrls: this.imageUrls ?? null,
            parsed: toSerializable(this.parsed),
            raw: toSerializable(this.raw)
        };
    }

    /**
     * Diagnostic rendering for logs. Never drains the stream.
     */
    toString(): string {
        return JSON.stringify(this.toJSON(), null, 4);
    }
}

function toSerializable(value: unknown): unknown {
    if (value === undefined) return null;
    return isJsonSerializable(value) ? value : String(value);
}
