import { z } from 'zod';
import { failure, type ToolFailure } from '../../utils/tool-result.js';

export type EnumCheck<T extends string> =
    | { ok: true; value: T | undefined }
    | { ok: false; failure: ToolFailure };

/**
 * Check an optional filter value against a closed enumeration before any
 * scanning. Omitted filters pass through as undefined.
 *
 * @example
 * checkEnumFilter(SpellSchoolSchema, 'school', 'pyromancy');
 * // failure: "Invalid school 'pyromancy'. Must be one of: abjuration, ..."
 */
export function checkEnumFilter<T extends [string, ...string[]]>(
    schema: z.ZodEnum<T>,
    label: string,
    value: string | undefined
): EnumCheck<T[number]> {
    if (value === undefined) {
        return { ok: true, value: undefined };
    }
    const parsed = schema.safeParse(value.trim().toLowerCase());
    if (parsed.success) {
        return { ok: true, value: parsed.data };
    }
    return {
        ok: false,
        failure: failure(`Invalid ${label} '${value}'. Must be one of: ${schema.options.join(', ')}`)
    };
}
