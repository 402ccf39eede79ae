import axios, { type AxiosInstance } from 'axios';
import {
  ClassTable,
  parseAnnotationSetLenient,
  type AnnotationSet,
  type BatchReport,
  type ImageSummary,
  type ParsedAnnotationSet,
} from '@annomask/shared';

/** Persistence port of the annotation store. */
export interface AnnotationRepository {
  /** Null when the image has no record yet. */
  fetch: (imageId: string) => Promise<ParsedAnnotationSet | null>;
  store: (imageId: string, set: AnnotationSet) => Promise<void>;
  /** Resolves to whether a record existed. */
  remove: (imageId: string) => Promise<boolean>;
}

export type MaskEncoding = 'visual' | 'raw';

const API_BASE: string = import.meta.env.VITE_API_BASE ?? '';

export const createApiClient = (baseURL = API_BASE): AxiosInstance => axios.create({ baseURL, timeout: 60000 });

// dev では空文字で OK（/api は Vite が 4000 へ中継）
export const imageUrl = (id: string, base = API_BASE) => `${base}/api/images/${encodeURIComponent(id)}`;

const annotationPath = (imageId: string) => `/api/annotations/${encodeURIComponent(imageId)}`;

export const createHttpRepository = (client: AxiosInstance): AnnotationRepository => ({
  async fetch(imageId) {
    const res = await client.get<unknown>(annotationPath(imageId));
    if (res.data === null || res.data === undefined || res.data === '') return null;
    const { set, rejected } = parseAnnotationSetLenient(res.data);
    if (rejected.length > 0) {
      console.warn(`Dropped ${rejected.length} malformed annotations for ${imageId}`);
    }
    return set;
  },
  async store(imageId, set) {
    await client.post(annotationPath(imageId), set);
  },
  async remove(imageId) {
    const res = await client.delete<{ deleted?: unknown }>(annotationPath(imageId));
    return res.data.deleted === true;
  },
});

/** Every image under the root, following `nextCursor` page by page. */
export const fetchImages = async (client: AxiosInstance, limit = 100): Promise<ImageSummary[]> => {
  const images: ImageSummary[] = [];
  let cursor: string | undefined;
  do {
    const res = await client.get<{ items: ImageSummary[]; nextCursor?: string }>('/api/images', {
      params: cursor === undefined ? { limit } : { limit, cursor },
    });
    images.push(...res.data.items);
    cursor = res.data.nextCursor;
  } while (cursor !== undefined);
  return images;
};

export const fetchClassTable = async (client: AxiosInstance) => {
  const res = await client.get<Record<string, unknown>>('/api/classes');
  return ClassTable.fromRecord(res.data);
};

export const exportMasks = async (client: AxiosInstance, options: { thickness?: number; encoding?: MaskEncoding } = {}) => {
  const res = await client.post<BatchReport>('/api/conversions/masks', options);
  return res.data;
};

export const importMasks = async (
  client: AxiosInstance,
  options: { encoding?: MaskEncoding; includeBackground?: boolean } = {}
) => {
  const res = await client.post<BatchReport>('/api/conversions/annotations', options);
  return res.data;
};
