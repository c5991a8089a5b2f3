import type { ChunkSource, ResponseChunk, StreamProgress, StreamState, ToolInvocation } from '../../types/response';
import { ToolCallAccumulator } from './ToolCallAccumulator';
import { StreamReuseError } from './errors';
import { logger } from '../../utils/logger';

/**
 * Receives the side effects of a drain. The envelope implements this so the
 * decoder never has to know about its other fields.
 */
export type StreamDecoderSink = {
    onText(text: string): void;
    onToolInvocations(invocations: ToolInvocation[]): void;
};

export type StreamDecoderOptions = {
    repairToolArguments?: boolean;
};

/**
 * Iterator handed out by StreamDecoder.iterate(). A generator's finally block
 * only runs once its body has started, so closing the claim before the first
 * next() is reported through onClose instead.
 */
export class ClaimedStream implements AsyncIterableIterator<StreamProgress> {
    constructor(
        private readonly inner: AsyncGenerator<StreamProgress, void, undefined>,
        private readonly onClose: () => void
    ) { }

    next(): Promise<IteratorResult<StreamProgress, void>> {
        return this.inner.next();
    }

    async return(value?: void): Promise<IteratorResult<StreamProgress, void>> {
        this.onClose();
        return this.inner.return(value);
    }

    async throw(error?: unknown): Promise<IteratorResult<StreamProgress, void>> {
        this.onClose();
        return this.inner.throw(error);
    }

    [Symbol.asyncIterator](): this {
        return this;
    }
}

/**
 * One-shot decoder over a chunk source.
 *
 * Emission runs one chunk behind consumption: the decoder only learns that a
 * chunk was the last one when pulling the next one reports the end of the
 * source, so it holds each delta back until then and can flag the true last
 * item as final.
 *
 * States: unopened -> open -> exhausted. Closing the iterator early (leaving
 * a `for await`, calling return() or throw()) or an upstream failure moves an
 * open decoder to abandoned instead, and any later iterate() call is rejected
 * just like after exhaustion.
 */
export class StreamDecoder {
    private state: StreamState = 'unopened';
    private readonly repairToolArguments: boolean;
    private log = logger.createLogger({ prefix: 'StreamDecoder' });

    constructor(
        private readonly source: ChunkSource,
        private readonly sink: StreamDecoderSink,
        options: StreamDecoderOptions = {}
    ) {
        this.repairToolArguments = options.repairToolArguments ?? false;
    }

    getState(): StreamState {
        return this.state;
    }

    isExhausted(): boolean {
        return this.state === 'exhausted';
    }

    /**
     * Claims the source and returns the incremental view.
     * The claim is checked here rather than on the first pull, so a second
     * consumer fails at the call site.
     * @throws StreamReuseError if the source was already claimed
     */
    iterate(): ClaimedStream {
        if (this.state !== 'unopened') {
            this.log.debug(`Rejecting iteration in state "${this.state}"`);
            throw new StreamReuseError(this.state);
        }
        this.state = 'open';
        this.log.debug('Stream opened');
        return new ClaimedStream(this.run(), () => this.abandon('closed by the consumer'));
    }

    /**
     * Pulls the whole source through iterate(), discarding the incremental items
     */
    async drain(): Promise<void> {
        const iterator = this.iterate();
        let step = await iterator.next();
        while (!step.done) {
            step = await iterator.next();
        }
    }

    private abandon(reason: string): void {
        if (this.state !== 'open') return;
        this.state = 'abandoned';
        this.log.debug(`Stream abandoned: ${reason}`);
    }

    private async *run(): AsyncGenerator<StreamProgress, void, undefined> {
        const accumulator = new ToolCallAccumulator({ repairArguments: this.repairToolArguments });
        let accumulatedText = '';
        let pendingDelta: string | undefined;
        let chunkCount = 0;

        try {
            for await (const chunk of this.source) {
                chunkCount += 1;
                this.mergeFragments(accumulator, chunk);

                if (pendingDelta !== undefined) {
                    accumulatedText += pendingDelta;
                    this.sink.onText(accumulatedText);
                    yield { isFinal: false, delta: pendingDelta, text: accumulatedText };
                }
                pendingDelta = chunk.text;
            }

            // The source is spent from here on, whatever finalization does
            this.state = 'exhausted';
            this.log.debug(`Stream exhausted after ${chunkCount} chunk(s)`);

            if (pendingDelta === undefined) return;

            if (accumulator.size > 0) {
                this.sink.onToolInvocations(accumulator.finalize());
            }

            accumulatedText += pendingDelta;
            this.sink.onText(accumulatedText);
            yield { isFinal: true, delta: pendingDelta, text: accumulatedText };
        } finally {
            this.abandon(`stopped after ${chunkCount} chunk(s)`);
        }
    }

    private mergeFragments(accumulator: ToolCallAccumulator, chunk: ResponseChunk): void {
        if (chunk.type !== 'structured' || !chunk.toolCallFragments?.length) return;
        accumulator.add(chunk.toolCallFragments);
    }
}
