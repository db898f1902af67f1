/**
 * Types shared by the template hierarchy resolvers, composer and filters.
 */

// ── Request classification ────────────────────────────────────────────

export const REQUEST_FLAGS = [
  'embed',
  '404',
  'search',
  'front-page',
  'home',
  'post-type-archive',
  'taxonomy',
  'attachment',
  'single',
  'page',
  'singular',
  'category',
  'tag',
  'author',
  'date',
  'archive',
] as const;

export type RequestFlag = (typeof REQUEST_FLAGS)[number];

// ── Queried object ────────────────────────────────────────────────────

export interface QueriedPost {
  kind: 'post';
  id: number;
  postType: string;
  postName: string;
}

export interface QueriedAttachment {
  kind: 'attachment';
  id: number;
  postName: string;
  /** e.g. `image/jpeg`; may be empty or lack a subtype */
  mimeType: string;
}

export interface QueriedTerm {
  kind: 'term';
  id: number;
  slug: string;
  taxonomy: string;
}

export interface QueriedUser {
  kind: 'user';
  id: number;
  nicename: string;
}

export interface NoQueriedObject {
  kind: 'none';
}

export type QueriedObject =
  | QueriedPost
  | QueriedAttachment
  | QueriedTerm
  | QueriedUser
  | NoQueriedObject;

/** Variants that are posts in the content model (attachments included). */
export type QueriedPostLike = QueriedPost | QueriedAttachment;

export const NO_QUERIED_OBJECT: NoQueriedObject = Object.freeze({ kind: 'none' });

// ── Request context ───────────────────────────────────────────────────

export interface QueryVars {
  /** Post types of the active query, in query order. Empty entries are ignored. */
  postTypes: readonly string[];
  pagename: string | null;
}

/** The request's active flags. Iteration follows `REQUEST_FLAGS` order. */
export interface RequestFlags extends Iterable<RequestFlag> {
  readonly size: number;
  has(flag: RequestFlag): boolean;
}

/**
 * Immutable snapshot of one request's classification. Several flags may be
 * set at once; the composer's activation order decides priority.
 */
export interface RequestContext {
  readonly flags: RequestFlags;
  readonly query: Readonly<QueryVars>;
  queriedObject(): QueriedObject;
}

// ── Content model seam ────────────────────────────────────────────────

export interface PostTypeObject {
  name: string;
  hasArchive: boolean;
}

/**
 * Lookups the resolvers need from the content-management system.
 * Every method answers from already-loaded state; none may perform I/O.
 */
export interface ContentModel {
  getPostTypeObject(postType: string): PostTypeObject | null;
  /** Explicit template assigned to a post, e.g. `templates/landing.php` */
  getPageTemplateSlug(object: QueriedPostLike): string | null;
  getPostFormat(object: QueriedPostLike): string | null;
  /** Defaults to `isSafeRelativePath` when omitted. */
  validateFile?(path: string): boolean;
}

// ── Categories & filters ──────────────────────────────────────────────

export const HIERARCHY_CATEGORIES = [
  'index',
  '404',
  'archive',
  'author',
  'category',
  'tag',
  'taxonomy',
  'date',
  'embed',
  'home',
  'front-page',
  'page',
  'search',
  'single',
  'singular',
  'attachment',
] as const;

export type HierarchyCategory = (typeof HIERARCHY_CATEGORIES)[number];

export const GLOBAL_FILTER_KEY = '*';

export type FilterKey = HierarchyCategory | typeof GLOBAL_FILTER_KEY;

/** Receives a full candidate list and returns the list to use instead. */
export type CandidateFilter = (candidates: readonly string[]) => string[];

/** Everything a category resolver may read besides the request context. */
export interface ResolverDeps {
  content: ContentModel;
  /** Extension stripped from explicit template overrides, e.g. `php` */
  templateSourceExtension: string;
}

export type CategoryResolver = (context: RequestContext, deps: ResolverDeps) => string[];
