import type { ObjectId } from 'mongodb';

/**
 * MongoDB document interface for blog accounts.
 *
 * ## Collection: `user`
 *
 * ## Indexes:
 * - `{ username: 1 }` - unique, login lookup
 *
 * `password` and `salt` are hex strings and are always written together.
 * The public representation (`IUser` in `@quire/types`) exposes `_id` as the
 * string `id`.
 *
 * @example
 * ```typescript
 * const collection = database.getCollection<IUserDocument>('user');
 * const user = await collection.findOne({ username: 'ada' }, { session });
 * ```
 */
export interface IUserDocument {
    _id: ObjectId;
    username: string;
    password: string;
    salt: string;
    email: string;
    firstname: string;
    lastname: string;
}
