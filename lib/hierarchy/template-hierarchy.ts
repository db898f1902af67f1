/**
 * Template hierarchy composer.
 *
 * Walks the fixed category activation order for a request context, suffixes
 * and filters each active category's candidates, appends the index fallback
 * and runs the global filters over the result. The renderer tries the
 * returned names in order and uses the first that exists.
 */

import { DEFAULT_HIERARCHY_CONFIG, type HierarchyConfig } from '@/lib/config/hierarchy-config';
import { createModuleLogger, type ModuleLogger } from '@/lib/observability/logger';
import { HierarchyFilterRegistry } from './filter-registry';
import { CATEGORY_RESOLVERS, resolvePostTypeArchive } from './resolvers';
import { normalizeExtension, toTemplateFile } from './template-file';
import { isSafeRelativePath } from './validate-file';
import {
  GLOBAL_FILTER_KEY,
  type ContentModel,
  type HierarchyCategory,
  type RequestContext,
  type RequestFlag,
  type ResolverDeps,
} from './types';

export interface TemplateHierarchyOptions {
  content: ContentModel;
  config?: Partial<HierarchyConfig>;
  filters?: HierarchyFilterRegistry;
}

/**
 * Activation order, most specific first. Every active flag contributes, so a
 * taxonomy request still gets the trailing `archive` candidates.
 */
export const ACTIVATION_ORDER: readonly RequestFlag[] = [
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
];

export class TemplateHierarchy {
  readonly filters: HierarchyFilterRegistry;
  private extension: string;
  private readonly deps: ResolverDeps;
  private readonly log: ModuleLogger;

  constructor(options: TemplateHierarchyOptions) {
    const config: HierarchyConfig = {
      extension: options.config?.extension ?? DEFAULT_HIERARCHY_CONFIG.extension,
      templateSourceExtension:
        options.config?.templateSourceExtension ??
        DEFAULT_HIERARCHY_CONFIG.templateSourceExtension,
      logLevel: options.config?.logLevel ?? DEFAULT_HIERARCHY_CONFIG.logLevel,
    };
    this.filters = options.filters ?? new HierarchyFilterRegistry();
    this.extension = normalizeExtension(config.extension);
    this.log = createModuleLogger('template-hierarchy', config.logLevel);
    this.deps = {
      content: this.withOverrideLogging(options.content),
      templateSourceExtension: normalizeExtension(config.templateSourceExtension),
    };
  }

  getExtension(): string {
    return this.extension;
  }

  /** Applies to every resolution started after the call. */
  setExtension(extension: string): void {
    this.extension = normalizeExtension(extension);
    this.log.debug({ extension: this.extension }, 'Template extension changed');
  }

  getFile(name: string): string {
    return toTemplateFile(name, this.extension);
  }

  /** Ordered candidate list for the whole request, ending in the index fallback. */
  getHierarchy(context: RequestContext): string[] {
    const templates: string[] = [];

    for (const flag of ACTIVATION_ORDER) {
      if (context.flags.has(flag)) {
        templates.push(...this.resolveFlag(flag, context));
      }
    }
    templates.push(...this.getTemplates('index', context));

    const result = this.filters.apply(GLOBAL_FILTER_KEY, templates);
    if (this.log.isLevelEnabled('debug')) {
      this.log.debug(
        { flags: [...context.flags], candidates: result },
        'Resolved template hierarchy'
      );
    }
    return result;
  }

  /** One category's suffixed candidates after that category's filters. */
  getTemplates(category: HierarchyCategory, context: RequestContext): string[] {
    const names = CATEGORY_RESOLVERS[category](context, this.deps);
    return this.filters.apply(category, names.map((name) => this.getFile(name)));
  }

  /**
   * Archive candidates for a post-type archive, or an empty list when the
   * post type has no archive. Runs the archive filters only when it delegates.
   */
  getPostTypeArchiveTemplates(context: RequestContext): string[] {
    const names = resolvePostTypeArchive(context, this.deps);
    if (names.length === 0) return [];
    return this.filters.apply('archive', names.map((name) => this.getFile(name)));
  }

  getIndexTemplates(context: RequestContext): string[] {
    return this.getTemplates('index', context);
  }

  get404Templates(context: RequestContext): string[] {
    return this.getTemplates('404', context);
  }

  getArchiveTemplates(context: RequestContext): string[] {
    return this.getTemplates('archive', context);
  }

  getAuthorTemplates(context: RequestContext): string[] {
    return this.getTemplates('author', context);
  }

  getCategoryTemplates(context: RequestContext): string[] {
    return this.getTemplates('category', context);
  }

  getTagTemplates(context: RequestContext): string[] {
    return this.getTemplates('tag', context);
  }

  getTaxonomyTemplates(context: RequestContext): string[] {
    return this.getTemplates('taxonomy', context);
  }

  getDateTemplates(context: RequestContext): string[] {
    return this.getTemplates('date', context);
  }

  getHomeTemplates(context: RequestContext): string[] {
    return this.getTemplates('home', context);
  }

  getFrontPageTemplates(context: RequestContext): string[] {
    return this.getTemplates('front-page', context);
  }

  getPageTemplates(context: RequestContext): string[] {
    return this.getTemplates('page', context);
  }

  getSearchTemplates(context: RequestContext): string[] {
    return this.getTemplates('search', context);
  }

  getSingleTemplates(context: RequestContext): string[] {
    return this.getTemplates('single', context);
  }

  getEmbedTemplates(context: RequestContext): string[] {
    return this.getTemplates('embed', context);
  }

  getSingularTemplates(context: RequestContext): string[] {
    return this.getTemplates('singular', context);
  }

  getAttachmentTemplates(context: RequestContext): string[] {
    return this.getTemplates('attachment', context);
  }

  private resolveFlag(flag: RequestFlag, context: RequestContext): string[] {
    if (flag === 'post-type-archive') {
      return this.getPostTypeArchiveTemplates(context);
    }
    return this.getTemplates(flag, context);
  }

  /** Same content model, but rejected template overrides are logged at debug level. */
  private withOverrideLogging(content: ContentModel): ContentModel {
    const validateFile = content.validateFile?.bind(content) ?? isSafeRelativePath;
    return {
      getPostTypeObject: (postType) => content.getPostTypeObject(postType),
      getPageTemplateSlug: (object) => content.getPageTemplateSlug(object),
      getPostFormat: (object) => content.getPostFormat(object),
      validateFile: (path) => {
        const safe = validateFile(path);
        if (!safe) {
          this.log.debug({ override: path }, 'Ignoring unsafe template override');
        }
        return safe;
      },
    };
  }
}
