import { describe, it, expect } from '@jest/globals';
import { ModelResponse } from '../../../../core/response/ModelResponse';
import { ResponseError, StreamReuseError, MalformedToolArgumentsError } from '../../../../core/response/errors';
import { structuredChunk, textChunk, toolCallFragment } from '../../../../core/response/chunks';
import { countingSource, collect } from '../../../helpers/streams';

describe('ModelResponse', () => {
    describe('non-streaming responses', () => {
        it('should return supplied text immediately and report not exhausted', async () => {
            const response = ModelResponse.fromText('done');

            expect(await response.getText()).toBe('done');
            expect(response.isExhausted()).toBe(false);
            expect(response.hasStream()).toBe(false);
            expect(response.getStreamState()).toBe('unopened');
        });

        it('should return undefined text when neither text nor stream was given', async () => {
            const response = new ModelResponse({ embedding: [0.1, 0.2] });

            expect(await response.getText()).toBeUndefined();
            expect(response.embedding).toEqual([0.1, 0.2]);
        });

        it('should reject iterate() when there is no stream', () => {
            const response = ModelResponse.fromText('done');

            expect(() => response.iterate()).toThrow(ResponseError);
            expect(() => response.iterate()).toThrow('This response does not carry a stream');
        });

        it('should keep directly supplied tool invocations', async () => {
            const response = new ModelResponse({
                toolInvocations: [{ type: 'tool_use', id: 'call_1', name: 'lookup', input: { q: 'x' } }]
            });

            const settled = await response.settle();
            expect(settled).toEqual({
                text: undefined,
                toolInvocations: [{ type: 'tool_use', id: 'call_1', name: 'lookup', input: { q: 'x' } }]
            });
        });
    });

    describe('incremental view', () => {
        it('should emit one behind and flag the last item as final', async () => {
            const response = ModelResponse.fromStream([textChunk('Hel'), textChunk('lo')]);

            const items = await collect(response.iterate());

            expect(items).toEqual([
                { isFinal: false, delta: 'Hel', text: 'Hel' },
                { isFinal: true, delta: 'lo', text: 'Hello' }
            ]);
            expect(await response.getText()).toBe('Hello');
            expect(response.isExhausted()).toBe(true);
        });

        it('should expose the text observed so far while the stream is being read', async () => {
            const { source, pulls } = countingSource([textChunk('a'), textChunk('b'), textChunk('c')]);
            const response = ModelResponse.fromStream(source);
            const iterator = response.iterate();

            const first = await iterator.next();
            expect(first.value).toEqual({ isFinal: false, delta: 'a', text: 'a' });
            expect(await response.getText()).toBe('a');
            expect(pulls()).toBe(2);

            await collect(iterator);
            expect(await response.getText()).toBe('abc');
        });
    });

    describe('settled view', () => {
        it('should drain an untouched stream on the first getText()', async () => {
            const { source, pulls } = countingSource([textChunk('Hel'), textChunk('lo')]);
            const response = ModelResponse.fromStream(source);

            expect(await response.getText()).toBe('Hello');
            expect(pulls()).toBe(2);
            expect(response.isExhausted()).toBe(true);
        });

        it('should return the same text on a second read without pulling again', async () => {
            const { source, pulls } = countingSource([textChunk('Hel'), textChunk('lo')]);
            const response = ModelResponse.fromStream(source);

            const first = await response.getText();
            const pullsAfterFirstRead = pulls();
            const second = await response.getText();

            expect(second).toBe(first);
            expect(pulls()).toBe(pullsAfterFirstRead);
        });

        it('should let setText() override the settled text after drainage', async () => {
            const response = ModelResponse.fromStream([textChunk('streamed')]);

            expect(await response.getText()).toBe('streamed');
            response.setText('edited');
            expect(await response.getText()).toBe('edited');
        });

        it('should not drain when text was supplied alongside a stream', async () => {
            const { source, pulls } = countingSource([textChunk('ignored')]);
            const response = new ModelResponse({ text: 'given', stream: source });

            expect(await response.getText()).toBe('given');
            expect(pulls()).toBe(0);
            expect(response.getStreamState()).toBe('unopened');
        });

        it('should drain through settle() and return tool invocations', async () => {
            const response = ModelResponse.fromStream([
                structuredChunk('Checking', [toolCallFragment(0, { id: 'call_1', type: 'function', name: 'calc', arguments: '{"a":' })]),
                structuredChunk('', [toolCallFragment(0, { arguments: '1}' })])
            ]);

            const settled = await response.settle();

            expect(settled).toEqual({
                text: 'Checking',
                toolInvocations: [{ type: 'tool_use', id: 'call_1', name: 'calc', input: { a: 1 } }]
            });
        });
    });

    describe('one-shot guarantee', () => {
        it('should reject a second iteration after the stream was drained', async () => {
            const response = ModelResponse.fromStream([textChunk('x')]);

            await collect(response.iterate());

            expect(() => response.iterate()).toThrow(StreamReuseError);
        });

        it('should reject iteration after getText() drained the stream', async () => {
            const response = ModelResponse.fromStream([textChunk('x'), textChunk('y')]);

            await response.getText();

            expect(() => response.iterate()).toThrow('The stream has been processed already. Read the settled text with getText() instead.');
        });

        it('should reject iteration of an empty stream once it was drained', async () => {
            const response = ModelResponse.fromStream([]);

            expect(await collect(response.iterate())).toEqual([]);
            expect(() => response.iterate()).toThrow(StreamReuseError);
        });

        it('should reject iteration after the caller stopped early', async () => {
            const { source, closed } = countingSource([textChunk('a'), textChunk('b'), textChunk('c')]);
            const response = ModelResponse.fromStream(source);

            for await (const item of response.iterate()) {
                expect(item.delta).toBe('a');
                break;
            }

            expect(response.isExhausted()).toBe(false);
            expect(response.getStreamState()).toBe('abandoned');
            expect(closed()).toBe(true);

            let caught: unknown;
            try {
                response.iterate();
            } catch (error) {
                caught = error;
            }
            expect(caught).toBeInstanceOf(StreamReuseError);
            expect(caught).toHaveProperty('state', 'abandoned');
        });
    });

    describe('abandoned streams', () => {
        it('should reject reading settled text after the caller stopped early', async () => {
            const response = ModelResponse.fromStream([textChunk('a'), textChunk('b'), textChunk('c')]);

            for await (const item of response.iterate()) {
                expect(item.text).toBe('a');
                break;
            }

            await expect(response.getText()).rejects.toThrow(StreamReuseError);
            await expect(response.settle()).rejects.toMatchObject({ name: 'StreamReuseError', state: 'abandoned' });
        });

        it('should treat a claim closed before the first pull as abandoned', async () => {
            const { source, pulls } = countingSource([textChunk('a')]);
            const response = ModelResponse.fromStream(source);
            const iterator = response.iterate();

            expect(await iterator.return()).toEqual({ done: true, value: undefined });

            expect(response.getStreamState()).toBe('abandoned');
            expect(pulls()).toBe(0);
            expect(() => response.iterate()).toThrow(StreamReuseError);
            await expect(response.getText()).rejects.toThrow(StreamReuseError);
        });

        it('should still serve partial text while the stream is open', async () => {
            const response = ModelResponse.fromStream([textChunk('a'), textChunk('b'), textChunk('c')]);
            const iterator = response.iterate();

            await iterator.next();

            expect(response.getStreamState()).toBe('open');
            expect(await response.getText()).toBe('a');
            await collect(iterator);
        });
    });

    describe('empty stream', () => {
        it('should leave text absent when no text was given', async () => {
            const response = ModelResponse.fromStream([]);

            expect(await collect(response.iterate())).toEqual([]);
            expect(await response.getText()).toBeUndefined();
            expect(response.isExhausted()).toBe(true);
        });

        it('should leave prior text untouched', async () => {
            const response = new ModelResponse({ text: 'prior', stream: [] });

            expect(await collect(response.iterate())).toEqual([]);
            expect(await response.getText()).toBe('prior');
        });
    });

    describe('tool invocations', () => {
        it('should concatenate argument fragments in arrival order', async () => {
            const response = ModelResponse.fromStream([
                structuredChunk('', [toolCallFragment(0, { id: 'call_1', type: 'function', name: 'calc', arguments: '{"a":' })]),
                structuredChunk('', [toolCallFragment(0, { arguments: '1}' })])
            ]);

            await collect(response.iterate());

            expect(response.getToolInvocations()).toEqual([
                { type: 'tool_use', id: 'call_1', name: 'calc', input: { a: 1 } }
            ]);
        });

        it('should keep interleaved invocations isolated', async () => {
            const response = ModelResponse.fromStream([
                structuredChunk('', [
                    toolCallFragment(0, { id: 'call_a', type: 'function', name: 'get_weather', arguments: '{"city":' }),
                    toolCallFragment(1, { id: 'call_b', type: 'function', name: 'get_time', arguments: '{"zone":' })
                ]),
                structuredChunk('', [toolCallFragment(0, { arguments: '"Paris"}' })]),
                structuredChunk('', [toolCallFragment(1, { arguments: '"UTC"}' })])
            ]);

            await response.settle();

            expect(response.getToolInvocations()).toEqual([
                { type: 'tool_use', id: 'call_a', name: 'get_weather', input: { city: 'Paris' } },
                { type: 'tool_use', id: 'call_b', name: 'get_time', input: { zone: 'UTC' } }
            ]);
        });

        it('should stay empty until the stream drains', async () => {
            const response = ModelResponse.fromStream([
                structuredChunk('', [toolCallFragment(0, { id: 'call_1', name: 'ping', arguments: '{}' })]),
                structuredChunk('done')
            ]);
            const iterator = response.iterate();

            await iterator.next();
            expect(response.getToolInvocations()).toEqual([]);

            await collect(iterator);
            expect(response.getToolInvocations()).toEqual([
                { type: 'tool_use', id: 'call_1', name: 'ping', input: {} }
            ]);
        });

        it('should append streamed invocations after supplied ones', async () => {
            const response = new ModelResponse({
                stream: [structuredChunk('', [toolCallFragment(0, { id: 'call_2', name: 'second', arguments: '{"n":2}' })])],
                toolInvocations: [{ type: 'tool_use', id: 'call_1', name: 'first', input: { n: 1 } }]
            });

            await response.settle();

            expect(response.getToolInvocations().map(call => call.id)).toEqual(['call_1', 'call_2']);
        });

        it('should surface malformed arguments and append nothing', async () => {
            const response = ModelResponse.fromStream(
                [
                    structuredChunk('Let me check', [toolCallFragment(0, { id: 'call_x', name: 'broken', arguments: '{"a":' })]),
                    structuredChunk('')
                ],
                { repairToolArguments: false }
            );
            const seen: string[] = [];

            await expect((async () => {
                for await (const item of response.iterate()) {
                    seen.push(item.delta);
                }
            })()).rejects.toThrow(MalformedToolArgumentsError);

            expect(seen).toEqual(['Let me check']);
            expect(response.getToolInvocations()).toEqual([]);
            expect(response.isExhausted()).toBe(true);
        });

        it('should repair truncated arguments when repair is enabled', async () => {
            const response = ModelResponse.fromStream(
                [structuredChunk('', [toolCallFragment(0, { id: 'call_r', name: 'get_weather', arguments: '{"city":"Paris"' })])],
                { repairToolArguments: true }
            );

            const settled = await response.settle();

            expect(settled.toolInvocations).toEqual([
                { type: 'tool_use', id: 'call_r', name: 'get_weather', input: { city: 'Paris' } }
            ]);
        });
    });

    describe('toString', () => {
        it('should serialize the fields in a stable order with 4-space indentation', () => {
            const response = ModelResponse.fromText('hi', {
                embedding: [0.5],
                raw: { id: 'resp_1' }
            });

            expect(response.toString()).toBe([
                '{',
                '    "text": "hi",',
                '    "embedding": [',
                '        0.5',
                '    ],',
                '    "imageUrls": null,',
                '    "parsed": null,',
                '    "raw": {',
                '        "id": "resp_1"',
                '    }',
                '}'
            ].join('\n'));
        });

        it('should coerce a raw payload that is not serializable to its string form', () => {
            class ProviderPayload {
                toString(): string {
                    return 'ProviderPayload<42>';
                }
            }
            const response = new ModelResponse({ text: 'hi', raw: new ProviderPayload() });

            expect(response.toJSON().raw).toBe('ProviderPayload<42>');
            expect(JSON.parse(response.toString())).toEqual({
                text: 'hi',
                embedding: null,
                imageUrls: null,
                parsed: null,
                raw: 'ProviderPayload<42>'
            });
        });

        it('should not consume the stream', () => {
            const { source, pulls } = countingSource([textChunk('a')]);
            const response = ModelResponse.fromStream(source);

            expect(response.toJSON().text).toBeNull();
            expect(pulls()).toBe(0);
            expect(response.getStreamState()).toBe('unopened');
        });
    });
});
