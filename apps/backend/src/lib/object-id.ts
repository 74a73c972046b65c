import { ObjectId } from 'mongodb';
import { InvalidIdError } from './errors.js';

/**
 * Outcome of parsing a client-supplied document id.
 */
export type ObjectIdParseResult =
    | { ok: true; value: ObjectId }
    | { ok: false; error: InvalidIdError };

const OBJECT_ID_PATTERN = /^[0-9a-fA-F]{24}$/;

/**
 * Parse a 24-hex-character string into an ObjectId without throwing.
 *
 * `ObjectId.isValid()` also accepts arbitrary 12-character strings, so the
 * format is checked against a hex pattern before the driver sees it.
 *
 * @param id - Candidate id from the caller
 * @returns The parsed id, or an InvalidIdError describing the rejected input
 *
 * @example
 * ```typescript
 * const parsed = parseObjectId(req.params.id);
 * if (!parsed.ok) {
 *     throw parsed.error;
 * }
 * await collection.findOne({ _id: parsed.value });
 * ```
 */
export function parseObjectId(id: string): ObjectIdParseResult {
    if (typeof id !== 'string' || !OBJECT_ID_PATTERN.test(id)) {
        return { ok: false, error: new InvalidIdError('Incorrect ID', { id }) };
    }
    return { ok: true, value: ObjectId.createFromHexString(id) };
}
