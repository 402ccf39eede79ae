import { useStore } from 'zustand';
import { createStore, type StoreApi } from 'zustand/vanilla';
import { devtools } from 'zustand/middleware';
import {
  SchemaError,
  cloneAnnotationSet,
  describeError,
  validateAnnotation,
  type Annotation,
  type AnnotationSet,
  type ImageSize,
  type OriginalPoint,
} from '@annomask/shared';
import type { AnnotationRepository } from '../lib/api';

export interface SaveReport {
  saved: number;
  deleted: number;
  failed: number;
  errors: { imageId: string; message: string }[];
}

export interface AnnotationState {
  sets: Record<string, AnnotationSet>;
  isDirty: boolean;
  append: (imageId: string, annotation: Annotation, imageSize: ImageSize) => boolean;
  deleteAt: (imageId: string, index: number) => boolean;
  clear: (imageId: string, imageSize: ImageSize) => void;
  list: (imageId: string) => Annotation[];
  getSet: (imageId: string) => AnnotationSet | undefined;
  load: (imageId: string, repository: AnnotationRepository, fallbackSize?: ImageSize) => Promise<boolean>;
  save: (repository: AnnotationRepository) => Promise<SaveReport>;
  markClean: () => void;
}

export type AnnotationStore = StoreApi<AnnotationState>;

const EMPTY: Annotation[] = [];

const cloneAnnotation = (annotation: Annotation): Annotation => ({
  label: annotation.label,
  type: annotation.type,
  coordinates_original: annotation.coordinates_original.map(([x, y]): OriginalPoint => [x, y]),
});

/**
 * One store per editing session. Every image touched in the session keeps
 * its set here until the session ends; `save` writes all of them.
 */
export const createAnnotationStore = () =>
  createStore<AnnotationState>()(
    devtools(
      (set, get) => ({
        sets: {},
        isDirty: false,
        append: (imageId, annotation, imageSize) => {
          if (validateAnnotation(annotation)) {
            return false;
          }
          const current = get().sets[imageId] ?? { annotations: [], original_size: imageSize };
          const next: AnnotationSet = {
            ...current,
            annotations: [...current.annotations, cloneAnnotation(annotation)],
          };
          set((state) => ({ sets: { ...state.sets, [imageId]: next }, isDirty: true }), false, 'append');
          return true;
        },
        deleteAt: (imageId, index) => {
          const current = get().sets[imageId];
          if (!current || !Number.isInteger(index) || index < 0 || index >= current.annotations.length) {
            return false;
          }
          const next: AnnotationSet = {
            ...current,
            annotations: current.annotations.filter((_, i) => i !== index),
          };
          set((state) => ({ sets: { ...state.sets, [imageId]: next }, isDirty: true }), false, 'deleteAt');
          return true;
        },
        clear: (imageId, imageSize) => {
          const current = get().sets[imageId];
          const next: AnnotationSet = { annotations: [], original_size: current?.original_size ?? imageSize };
          set((state) => ({ sets: { ...state.sets, [imageId]: next }, isDirty: true }), false, 'clear');
        },
        list: (imageId) => get().sets[imageId]?.annotations ?? EMPTY,
        getSet: (imageId) => get().sets[imageId],
        load: async (imageId, repository, fallbackSize) => {
          if (get().sets[imageId]) {
            return false;
          }
          const parsed = await repository.fetch(imageId);
          if (!parsed) {
            return false;
          }
          const originalSize = parsed.original_size ?? fallbackSize;
          if (!originalSize) {
            throw new SchemaError(`Record for ${imageId} has no original_size`);
          }
          // 読み込み中に編集が始まっていたら、そちらを優先
          if (get().sets[imageId]) {
            return false;
          }
          const loaded: AnnotationSet = { annotations: parsed.annotations, original_size: originalSize };
          set((state) => ({ sets: { ...state.sets, [imageId]: loaded } }), false, 'load');
          return true;
        },
        save: async (repository) => {
          const report: SaveReport = { saved: 0, deleted: 0, failed: 0, errors: [] };
          const snapshot = Object.entries(get().sets).map(
            ([imageId, entry]): [string, AnnotationSet] => [imageId, cloneAnnotationSet(entry)]
          );
          for (const [imageId, entry] of snapshot) {
            try {
              if (entry.annotations.length > 0) {
                await repository.store(imageId, entry);
                report.saved += 1;
              } else if (await repository.remove(imageId)) {
                report.deleted += 1;
              }
            } catch (error) {
              report.failed += 1;
              report.errors.push({ imageId, message: describeError(error) });
              console.error(error);
            }
          }
          if (report.failed === 0) {
            set({ isDirty: false }, false, 'save');
          }
          return report;
        },
        markClean: () => set({ isDirty: false }, false, 'markClean'),
      }),
      { name: 'annotations' }
    )
  );

export const useAnnotationStore = <T>(store: AnnotationStore, selector: (state: AnnotationState) => T) =>
  useStore(store, selector);
