import { z } from 'zod';
import type { ResponseChunk, ToolCallFragment } from '../../types/response';
import { InvalidChunkError } from './errors';

const FunctionFragmentSchema = z.object({
    name: z.string().optional(),
    arguments: z.string().optional()
});

const ToolCallFragmentSchema = z.object({
    index: z.number().int().nonnegative(),
    id: z.string().optional(),
    type: z.string().optional(),
    function: FunctionFragmentSchema.nullish()
});

// Unknown keys are rejected rather than stripped, so a mislabelled chunk
// cannot lose its tool calls on the way in
const TextChunkSchema = z.object({
    type: z.literal('text'),
    text: z.string()
}).strict();

const StructuredChunkSchema = z.object({
    type: z.literal('structured'),
    text: z.string(),
    toolCallFragments: z.array(ToolCallFragmentSchema).optional()
}).strict();

// Producer layout: `{ text, tool_calls }`, either field may be missing.
// It carries no `type`, so a tagged chunk with an unknown tag fails here too.
const WireChunkSchema = z.object({
    text: z.string().default(''),
    tool_calls: z.array(ToolCallFragmentSchema).nullish()
}).strict();

export const RawChunkSchema = z.union([
    z.string(),
    TextChunkSchema,
    StructuredChunkSchema,
    WireChunkSchema
]);

export type RawChunk = z.input<typeof RawChunkSchema>;

type ParsedFragment = z.infer<typeof ToolCallFragmentSchema>;

function toFragment(parsed: ParsedFragment): ToolCallFragment {
    const fragment: ToolCallFragment = { index: parsed.index };
    if (parsed.id !== undefined) fragment.id = parsed.id;
    if (parsed.type !== undefined) fragment.type = parsed.type;
    if (parsed.function) {
        fragment.function = { ...parsed.function };
    }
    return fragment;
}

/**
 * Resolves whatever a producer handed over into the tagged chunk shape
 * @throws InvalidChunkError if the value matches none of the accepted layouts
 */
export function parseChunk(raw: unknown): ResponseChunk {
    const result = RawChunkSchema.safeParse(raw);
    if (!result.success) {
        throw new InvalidChunkError(
            'Chunk does not match any supported layout',
            result.error.issues.map(issue => ({
                path: issue.path.join('.'),
                message: issue.message
            }))
        );
    }

    const chunk = result.data;
    if (typeof chunk === 'string') {
        return { type: 'text', text: chunk };
    }
    if ('type' in chunk) {
        if (chunk.type === 'text') return { type: 'text', text: chunk.text };
        return chunk.toolCallFragments
            ? { type: 'structured', text: chunk.text, toolCallFragments: chunk.toolCallFragments.map(toFragment) }
            : { type: 'structured', text: chunk.text };
    }
    return chunk.tool_calls
        ? { type: 'structured', text: chunk.text, toolCallFragments: chunk.tool_calls.map(toFragment) }
        : { type: 'structured', text: chunk.text };
}

/**
 * Lazily validates a raw producer stream, one chunk per pull
 */
export async function* parseChunkStream(
    source: AsyncIterable<unknown> | Iterable<unknown>
): AsyncGenerator<ResponseChunk, void, undefined> {
    for await (const raw of source) {
        yield parseChunk(raw);
    }
}
