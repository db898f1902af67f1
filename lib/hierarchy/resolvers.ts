/**
 * Category resolvers.
 *
 * One pure function per content category. Each returns bare candidate names
 * (no extension), most specific first. Missing data shortens the list; no
 * resolver throws.
 */

import { stripSourceExtension } from './template-file';
import { isSafeRelativePath } from './validate-file';
import type {
  CategoryResolver,
  HierarchyCategory,
  QueriedObject,
  QueriedPostLike,
  QueriedTerm,
  RequestContext,
  ResolverDeps,
} from './types';

// ── Helpers ───────────────────────────────────────────────────────────

const ESCAPE_RUN_RE = /(?:%[0-9a-fA-F]{2})+/g;

/**
 * URL-decode a slug, reading `+` as a space. Each run of `%XX` escapes is
 * decoded on its own; a run that is not valid UTF-8 and any stray `%` stay
 * as they are.
 */
export function decodeSlug(value: string): string {
  return value.replace(/\+/g, ' ').replace(ESCAPE_RUN_RE, (run) => {
    try {
      return decodeURIComponent(run);
    } catch {
      return run;
    }
  });
}

/** `[prefix-decoded, prefix-raw]`, the decoded form only when it differs. */
function slugVariants(prefix: string, raw: string): string[] {
  const decoded = decodeSlug(raw);
  return decoded !== raw ? [`${prefix}-${decoded}`, `${prefix}-${raw}`] : [`${prefix}-${raw}`];
}

function asPostLike(object: QueriedObject): QueriedPostLike | null {
  return object.kind === 'post' || object.kind === 'attachment' ? object : null;
}

function postTypeOf(object: QueriedPostLike): string {
  return object.kind === 'attachment' ? 'attachment' : object.postType;
}

function termWithSlug(object: QueriedObject): QueriedTerm | null {
  return object.kind === 'term' && object.slug ? object : null;
}

function queriedObjectId(object: QueriedObject): number {
  return object.kind === 'none' ? 0 : object.id;
}

function activePostTypes(context: RequestContext): string[] {
  return context.query.postTypes.filter((postType) => postType !== '');
}

// ── Resolvers ─────────────────────────────────────────────────────────

export function resolveIndex(): string[] {
  return ['index'];
}

export function resolve404(): string[] {
  return ['404'];
}

export function resolveArchive(context: RequestContext): string[] {
  const postTypes = activePostTypes(context);
  const templates: string[] = [];
  if (postTypes.length === 1) {
    templates.push(`archive-${postTypes[0]}`);
  }
  templates.push('archive');
  return templates;
}

/**
 * Archive ladder for a post-type archive, or nothing at all when the queried
 * post type is unknown or declares no archive.
 */
export function resolvePostTypeArchive(context: RequestContext, deps: ResolverDeps): string[] {
  const postType = context.query.postTypes[0];
  if (postType === undefined) return [];

  const postTypeObject = deps.content.getPostTypeObject(postType);
  if (!postTypeObject?.hasArchive) return [];

  return resolveArchive(context);
}

export function resolveAuthor(context: RequestContext): string[] {
  const author = context.queriedObject();
  const templates: string[] = [];
  if (author.kind === 'user') {
    templates.push(`author-${author.nicename}`, `author-${author.id}`);
  }
  templates.push('author');
  return templates;
}

function resolveTermLadder(prefix: 'category' | 'tag', context: RequestContext): string[] {
  const term = termWithSlug(context.queriedObject());
  const templates: string[] = [];
  if (term) {
    templates.push(...slugVariants(prefix, term.slug), `${prefix}-${term.id}`);
  }
  templates.push(prefix);
  return templates;
}

export function resolveCategory(context: RequestContext): string[] {
  return resolveTermLadder('category', context);
}

export function resolveTag(context: RequestContext): string[] {
  return resolveTermLadder('tag', context);
}

export function resolveTaxonomy(context: RequestContext): string[] {
  const term = termWithSlug(context.queriedObject());
  const templates: string[] = [];
  if (term) {
    templates.push(
      ...slugVariants(`taxonomy-${term.taxonomy}`, term.slug),
      `taxonomy-${term.taxonomy}`
    );
  }
  templates.push('taxonomy');
  return templates;
}

export function resolveDate(): string[] {
  return ['date'];
}

export function resolveHome(): string[] {
  return ['home', 'index'];
}

export function resolveFrontPage(): string[] {
  return ['front-page'];
}

export function resolvePage(context: RequestContext, deps: ResolverDeps): string[] {
  const object = context.queriedObject();
  const post = asPostLike(object);
  const id = queriedObjectId(object);
  const templates: string[] = [];

  const override = post ? deps.content.getPageTemplateSlug(post) : null;
  if (override) {
    const name = stripSourceExtension(override, deps.templateSourceExtension);
    if (name) templates.push(name);
  }

  let pagename = context.query.pagename ?? '';
  if (!pagename && id && post) {
    pagename = post.postName;
  }
  if (pagename) {
    templates.push(...slugVariants('page', pagename));
  }

  if (id) {
    templates.push(`page-${id}`);
  }
  templates.push('page');
  return templates;
}

export function resolveSearch(): string[] {
  return ['search'];
}

export function resolveSingle(context: RequestContext, deps: ResolverDeps): string[] {
  const object = asPostLike(context.queriedObject());
  const templates: string[] = [];
  const postType = object ? postTypeOf(object) : '';

  if (object && postType) {
    const override = deps.content.getPageTemplateSlug(object);
    const validateFile = deps.content.validateFile ?? isSafeRelativePath;
    if (override && validateFile(override)) {
      const name = stripSourceExtension(override, deps.templateSourceExtension);
      if (name) templates.push(name);
    }
    templates.push(...slugVariants(`single-${postType}`, object.postName), `single-${postType}`);
  }

  templates.push('single');
  return templates;
}

export function resolveEmbed(context: RequestContext, deps: ResolverDeps): string[] {
  const object = asPostLike(context.queriedObject());
  const templates: string[] = [];
  const postType = object ? postTypeOf(object) : '';

  if (object && postType) {
    const postFormat = deps.content.getPostFormat(object);
    if (postFormat) {
      templates.push(`embed-${postType}-${postFormat}`);
    }
    templates.push(`embed-${postType}`);
  }

  templates.push('embed');
  return templates;
}

export function resolveSingular(): string[] {
  return ['singular'];
}

export function resolveAttachment(context: RequestContext): string[] {
  const attachment = context.queriedObject();
  const templates: string[] = [];

  if (attachment.kind === 'attachment') {
    const [type = '', subtype = ''] = attachment.mimeType.split('/');
    if (subtype) {
      templates.push(`${type}-${subtype}`, subtype);
    }
    if (type) templates.push(type);
  }

  templates.push('attachment');
  return templates;
}

/** Resolver per filterable category, keyed the same way as the filter registry. */
export const CATEGORY_RESOLVERS: Record<HierarchyCategory, CategoryResolver> = {
  index: resolveIndex,
  '404': resolve404,
  archive: resolveArchive,
  author: resolveAuthor,
  category: resolveCategory,
  tag: resolveTag,
  taxonomy: resolveTaxonomy,
  date: resolveDate,
  embed: resolveEmbed,
  home: resolveHome,
  'front-page': resolveFrontPage,
  page: resolvePage,
  search: resolveSearch,
  single: resolveSingle,
  singular: resolveSingular,
  attachment: resolveAttachment,
};
