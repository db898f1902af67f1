/**
 * Request context adapter.
 *
 * Wraps the host system's request predicates and query accessors into the
 * frozen `RequestContext` the hierarchy reads. The queried object is fetched
 * on first use and memoized for the rest of the resolution.
 */

import {
  NO_QUERIED_OBJECT,
  REQUEST_FLAGS,
  type QueriedObject,
  type QueryVars,
  type RequestContext,
  type RequestFlag,
  type RequestFlags,
} from './types';

export interface ContextSource {
  /** Whether the current request satisfies `flag` (is_single, is_404, ...). */
  is(flag: RequestFlag): boolean;
  /** Raw `post_type` query var: a single type, a list, or nothing. */
  queryPostType(): string | readonly string[] | null | undefined;
  queryPagename(): string | null | undefined;
  getQueriedObject(): QueriedObject | null | undefined;
}

/** Read-only view over the active flags; the backing set is never exposed. */
class RequestFlagSet implements RequestFlags {
  readonly #flags: Set<RequestFlag>;

  constructor(flags: Iterable<RequestFlag>) {
    this.#flags = new Set(flags);
    Object.freeze(this);
  }

  get size(): number {
    return this.#flags.size;
  }

  has(flag: RequestFlag): boolean {
    return this.#flags.has(flag);
  }

  [Symbol.iterator](): Iterator<RequestFlag> {
    return this.#flags.values();
  }
}

function toPostTypes(raw: string | readonly string[] | null | undefined): string[] {
  if (raw === null || raw === undefined) return [];
  return typeof raw === 'string' ? [raw] : [...raw];
}

export function buildRequestContext(source: ContextSource): RequestContext {
  const flags = new RequestFlagSet(REQUEST_FLAGS.filter((flag) => source.is(flag)));
  const query: QueryVars = Object.freeze({
    postTypes: Object.freeze(toPostTypes(source.queryPostType())),
    pagename: source.queryPagename() || null,
  });

  let queried: QueriedObject | undefined;

  return Object.freeze({
    flags,
    query,
    queriedObject(): QueriedObject {
      if (queried === undefined) {
        queried = source.getQueriedObject() ?? NO_QUERIED_OBJECT;
      }
      return queried;
    },
  });
}

export interface StaticContextInit {
  flags?: Iterable<RequestFlag>;
  postTypes?: readonly string[];
  pagename?: string | null;
  queriedObject?: QueriedObject;
}

/** Context from plain values, for callers that already hold the classification. */
export function createRequestContext(init: StaticContextInit = {}): RequestContext {
  const flags = new Set(init.flags ?? []);
  const queriedObject = init.queriedObject ?? NO_QUERIED_OBJECT;

  return buildRequestContext({
    is: (flag) => flags.has(flag),
    queryPostType: () => init.postTypes,
    queryPagename: () => init.pagename,
    getQueriedObject: () => queriedObject,
  });
}
