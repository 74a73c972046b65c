import type { IEntityReference } from '../reference/IEntityReference.js';

/**
 * Blog article as returned by the article service.
 */
export interface IArticle {
    /** 24-hex-character document id */
    id: string;
    title: string;
    /** URL-safe slug, always derived from `title` by the service */
    pretty: string;
    /** Article body (markdown or HTML, stored verbatim) */
    body: string;
    tags: string[];
    /** Reference to the header image */
    image: string;
    /** Reference to the listing thumbnail */
    thumbnail: string;
    /** Free-form publication status, e.g. `draft` or `published` */
    status: string;
    create: Date;
    modified: Date;
    /** Weak reference to the authoring account */
    author: IEntityReference;
}

/**
 * Input for creating an article. The slug is derived from `title`.
 */
export interface ICreateArticleInput {
    title: string;
    body: string;
    tags: string[];
    image: string;
    thumbnail: string;
    status: string;
    /** Creation time; defaults to now. `modified` is initialised to the same value. */
    create?: Date;
    /** Id of the authoring account; must be 24 hex characters */
    authorId: string;
}

/**
 * Input for updating an article. The slug is re-derived from `title`.
 */
export interface IUpdateArticleInput {
    title: string;
    body: string;
    tags: string[];
    image: string;
    thumbnail: string;
    status: string;
    /** Modification time; defaults to now */
    modified?: Date;
    /** Id of the authoring account */
    authorId: string;
}
