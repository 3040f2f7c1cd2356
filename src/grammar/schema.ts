import { z } from 'zod';
import type { GrammarDefinition } from '../types/grammar.js';
import { createGrammarError } from '../types/errors.js';

const SymbolSchema = z.string().min(1).regex(/^\S+$/, 'symbols cannot contain whitespace');

/**
 * JSON form of a grammar definition. Productions and patterns may be given
 * as records or as ordered lists.
 */
export const GrammarDefinitionSchema = z.object({
    start: SymbolSchema.optional(),
    nonTerminals: z.array(SymbolSchema).optional(),
    terminals: z.array(SymbolSchema).optional(),
    productions: z.union([
        z.array(z.object({ lhs: SymbolSchema, rhs: z.array(SymbolSchema) })),
        z.record(z.array(z.array(SymbolSchema))),
    ]),
    patterns: z.union([
        z.array(z.tuple([SymbolSchema, z.string().min(1)])),
        z.record(z.string().min(1)),
    ]).optional(),
});

/**
 * Validate unknown input (typically parsed JSON) as a grammar definition
 */
export function parseGrammarDefinition(input: unknown): GrammarDefinition {
    const result = GrammarDefinitionSchema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
        throw createGrammarError(`Invalid grammar definition: ${issues.join('; ')}`, undefined, { issues });
    }
    return result.data;
}
