import { jsonrepair } from 'jsonrepair';
import type { JsonValue, ToolCallFragment, ToolInvocation } from '../../types/response';
import { MalformedToolArgumentsError } from './errors';
import { logger } from '../../utils/logger';

// In-progress state of one tool call, keyed by fragment index
type ToolCallBuilder = {
    id: string;
    type: string;
    name: string;
    accumulatedArguments: string;
    fragmentCount: number;
};

export type ToolCallAccumulatorOptions = {
    repairArguments?: boolean;
};

/**
 * Merges streamed tool call fragments by index and turns them into finished
 * invocations once the stream has ended. Owned by a single drain; nothing in
 * here is visible to callers before finalize().
 */
export class ToolCallAccumulator {
    private readonly builders: Map<number, ToolCallBuilder> = new Map();
    private readonly repairArguments: boolean;
    private log = logger.createLogger({ prefix: 'ToolCallAccumulator' });

    constructor(options: ToolCallAccumulatorOptions = {}) {
        this.repairArguments = options.repairArguments ?? false;
    }

    add(fragments: ToolCallFragment[]): void {
        for (const fragment of fragments) {
            const existing = this.builders.get(fragment.index);

            if (!existing) {
                this.log.debug(`Initializing tool call builder for index ${fragment.index}`);
                this.builders.set(fragment.index, {
                    id: fragment.id ?? '',
                    type: fragment.type ?? '',
                    name: fragment.function?.name ?? '',
                    accumulatedArguments: fragment.function?.arguments ?? '',
                    fragmentCount: 1
                });
                continue;
            }

            // Later fragments only fill identity fields that are still empty
            if (!existing.id && fragment.id) existing.id = fragment.id;
            if (!existing.type && fragment.type) existing.type = fragment.type;
            if (!existing.name && fragment.function?.name) existing.name = fragment.function.name;
            if (fragment.function?.arguments) {
                existing.accumulatedArguments += fragment.function.arguments;
            }
            existing.fragmentCount += 1;
        }
    }

    get size(): number {
        return this.builders.size;
    }

    /**
     * Parses every accumulated call, in index order.
     * @throws MalformedToolArgumentsError for the first index whose arguments are not JSON
     */
    finalize(): ToolInvocation[] {
        const indices = [...this.builders.keys()].sort((a, b) => a - b);
        const invocations: ToolInvocation[] = [];

        for (const index of indices) {
            const builder = this.builders.get(index);
            if (!builder) continue;

            invocations.push({
                type: 'tool_use',
                id: builder.id,
                name: builder.name,
                input: this.parseArguments(index, builder)
            });
            this.log.debug(`Finalized tool call "${builder.name}" at index ${index} from ${builder.fragmentCount} fragment(s)`);
        }

        return invocations;
    }

    private parseArguments(index: number, builder: ToolCallBuilder): JsonValue {
        const source = builder.accumulatedArguments;
        // Tools without parameters are streamed with no argument text at all
        if (source.trim() === '') return {};

        try {
            return JSON.parse(source);
        } catch (parseError) {
            if (this.repairArguments) {
                const repaired = this.tryRepair(source);
                if (repaired !== undefined) {
                    this.log.info(`Repaired malformed arguments for tool "${builder.name}" at index ${index}`);
                    return repaired;
                }
            }
            this.log.warn(`Malformed arguments for tool "${builder.name}" at index ${index}`, { arguments: source });
            throw new MalformedToolArgumentsError(index, builder.name, source, parseError);
        }
    }

    private tryRepair(source: string): JsonValue | undefined {
        try {
            return JSON.parse(jsonrepair(source));
        } catch {
            return undefined;
        }
    }
}
