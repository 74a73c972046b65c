/**
 * Collections that may be the target of a weak reference.
 */
export type ReferenceCollection = 'user';

/**
 * Non-owning pointer to a document in another collection.
 *
 * A reference carries only the target collection and the target id. It is
 * never dereferenced implicitly: the owner of the target collection resolves
 * it on request (see `IUserService.resolveReference`). The target may have
 * been deleted since the reference was written.
 *
 * @example
 * ```typescript
 * const author: IEntityReference = { collection: 'user', id: '65a1f0c2e4b0a1b2c3d4e5f6' };
 * const user = await userService.resolveReference(author);
 * ```
 */
export interface IEntityReference {
    /** Collection the referenced document lives in */
    collection: ReferenceCollection;
    /** 24-hex-character id of the referenced document */
    id: string;
}
