import type { ContentModel, PostTypeObject, QueriedPostLike } from '../types';

interface FakeContentInit {
  postTypes?: Record<string, PostTypeObject>;
  templates?: Record<number, string>;
  formats?: Record<number, string>;
  validateFile?: (path: string) => boolean;
}

export function fakeContentModel(init: FakeContentInit = {}): ContentModel {
  return {
    getPostTypeObject: (postType: string) => init.postTypes?.[postType] ?? null,
    getPageTemplateSlug: (object: QueriedPostLike) => init.templates?.[object.id] ?? null,
    getPostFormat: (object: QueriedPostLike) => init.formats?.[object.id] ?? null,
    ...(init.validateFile ? { validateFile: init.validateFile } : {}),
  };
}
