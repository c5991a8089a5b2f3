import type { StructuredChunk, TextChunk, ToolCallFragment } from '../../types/response';

export function textChunk(text: string): TextChunk {
    return { type: 'text', text };
}

export function structuredChunk(text: string, toolCallFragments?: ToolCallFragment[]): StructuredChunk {
    return toolCallFragments ? { type: 'structured', text, toolCallFragments } : { type: 'structured', text };
}

/**
 * Builds a fragment in the shape most backends stream tool calls in
 */
export function toolCallFragment(
    index: number,
    fields: { id?: string; type?: string; name?: string; arguments?: string } = {}
): ToolCallFragment {
    const fragment: ToolCallFragment = { index };
    if (fields.id !== undefined) fragment.id = fields.id;
    if (fields.type !== undefined) fragment.type = fields.type;
    if (fields.name !== undefined || fields.arguments !== undefined) {
        fragment.function = {};
        if (fields.name !== undefined) fragment.function.name = fields.name;
        if (fields.arguments !== undefined) fragment.function.arguments = fields.arguments;
    }
    return fragment;
}
