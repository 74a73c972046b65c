import type { DBRef, ObjectId } from 'mongodb';

/**
 * MongoDB document interface for blog articles.
 *
 * Field names are the stored layout shared with existing article data, so
 * several differ from the public `IArticle` shape:
 *
 * | Stored     | Public      |
 * |------------|-------------|
 * | `titre`    | `title`     |
 * | `texte`    | `body`      |
 * | `vignette` | `thumbnail` |
 * | `userref`  | `author`    |
 *
 * ## Collection: `article`
 *
 * ## Indexes:
 * - `{ pretty: 1 }` - slug lookup
 * - `{ status: 1 }` - listing by status
 */
export interface IArticleDocument {
    _id: ObjectId;
    titre: string;
    /** Slug derived from `titre` on every write */
    pretty: string;
    texte: string;
    tags: string[];
    image: string;
    vignette: string;
    status: string;
    create: Date;
    modified: Date;
    /** Weak reference to the author, `{ $ref: 'user', $id: ObjectId }` */
    userref: DBRef;
}
