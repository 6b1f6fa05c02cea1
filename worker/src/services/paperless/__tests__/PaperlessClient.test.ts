import { mkdtemp, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { HttpClient, type FetchLike } from '../../../http/HttpClient';
import { PaperlessClient, buildAuthHeaders } from '../PaperlessClient';

const BASE_URL = 'http://paperless.test';

type Route = (init: RequestInit) => Response;

function routedFetch(routes: Record<string, Route>) {
  const requests: Array<{ url: string; init: RequestInit }> = [];
  const fetchImpl: FetchLike = async (url, init) => {
    requests.push({ url, init });
    const route = routes[url];
    return route ? route(init) : new Response('not found', { status: 404 });
  };
  return { fetchImpl, requests };
}

const json = (body: unknown) => () =>
  new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } });

function documentPage(ids: number[], count: number, next: string | null) {
  return json({
    count,
    next,
    results: ids.map((id) => ({ id, title: `doc_${id}`, content: `text ${id}`, custom_fields: [] })),
  });
}

function createClient(fetchImpl: FetchLike): PaperlessClient {
  const http = new HttpClient({ fetchImpl, headers: buildAuthHeaders('test-secret'), sleep: async () => {} });
  return new PaperlessClient({ baseUrl: `${BASE_URL}/`, http });
}

describe('PaperlessClient', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('listDocuments', () => {
    it('follows next cursors until every page is collected', async () => {
      const { fetchImpl, requests } = routedFetch({
        [`${BASE_URL}/api/documents/`]: documentPage([1, 2], 5, `${BASE_URL}/api/documents/?page=2`),
        [`${BASE_URL}/api/documents/?page=2`]: documentPage([3, 4], 5, `${BASE_URL}/api/documents/?page=3`),
        [`${BASE_URL}/api/documents/?page=3`]: documentPage([5], 5, null),
      });

      const documents = await createClient(fetchImpl).listDocuments();

      expect(documents.map((doc) => doc.id)).toEqual([1, 2, 3, 4, 5]);
      expect(requests).toHaveLength(3);
    });

    it('sends the token header', async () => {
      const { fetchImpl, requests } = routedFetch({
        [`${BASE_URL}/api/documents/`]: documentPage([1], 1, null),
      });

      await createClient(fetchImpl).listDocuments();

      expect(requests[0].init.headers).toEqual({ Authorization: 'Token test-secret' });
    });

    it('appends the filter as the query string', async () => {
      const { fetchImpl, requests } = routedFetch({
        [`${BASE_URL}/api/documents/?tags__id=4`]: documentPage([9], 1, null),
      });

      const documents = await createClient(fetchImpl).listDocuments('?tags__id=4');

      expect(documents.map((doc) => doc.id)).toEqual([9]);
      expect(requests[0].url).toBe(`${BASE_URL}/api/documents/?tags__id=4`);
    });

    it('keeps the pages gathered before a later page fails', async () => {
      const { fetchImpl } = routedFetch({
        [`${BASE_URL}/api/documents/`]: documentPage([1, 2], 4, `${BASE_URL}/api/documents/?page=2`),
      });

      const documents = await createClient(fetchImpl).listDocuments();

      expect(documents.map((doc) => doc.id)).toEqual([1, 2]);
    });

    it('returns an empty list when the first page fails', async () => {
      const { fetchImpl } = routedFetch({});

      await expect(createClient(fetchImpl).listDocuments()).resolves.toEqual([]);
    });
  });

  describe('getDocument', () => {
    it('parses the document and defaults missing content to an empty string', async () => {
      const { fetchImpl } = routedFetch({
        [`${BASE_URL}/api/documents/12/`]: json({ id: 12, title: 'scan', content: null }),
      });

      await expect(createClient(fetchImpl).getDocument(12)).resolves.toEqual({
        id: 12,
        title: 'scan',
        content: '',
        custom_fields: [],
      });
    });

    it('returns null when the payload is not a document', async () => {
      const { fetchImpl } = routedFetch({
        [`${BASE_URL}/api/documents/12/`]: json({ detail: 'Not found.' }),
      });

      await expect(createClient(fetchImpl).getDocument(12)).resolves.toBeNull();
    });
  });

  describe('downloadDocument', () => {
    let directory: string;

    beforeEach(async () => {
      directory = await mkdtemp(path.join(os.tmpdir(), 'retitler-download-'));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it('streams the original file to disk with an extension from the content type', async () => {
      const { fetchImpl } = routedFetch({
        [`${BASE_URL}/api/documents/3/download/`]: () =>
          new Response('%PDF-1.4 fake', { status: 200, headers: { 'Content-Type': 'application/pdf' } }),
      });

      const target = await createClient(fetchImpl).downloadDocument(3, directory);

      expect(target).toBe(path.join(directory, 'document_3.pdf'));
      await expect(readFile(path.join(directory, 'document_3.pdf'), 'utf8')).resolves.toBe('%PDF-1.4 fake');
    });

    it('names image downloads after their type', async () => {
      const { fetchImpl } = routedFetch({
        [`${BASE_URL}/api/documents/4/download/`]: () =>
          new Response('png bytes', { status: 200, headers: { 'Content-Type': 'image/png' } }),
      });

      await expect(createClient(fetchImpl).downloadDocument(4, directory)).resolves.toBe(
        path.join(directory, 'document_4.png')
      );
    });

    it('returns null when the download fails', async () => {
      const { fetchImpl } = routedFetch({});

      await expect(createClient(fetchImpl).downloadDocument(3, directory)).resolves.toBeNull();
    });
  });

  describe('patches', () => {
    it('sends the title as a PATCH body', async () => {
      const { fetchImpl, requests } = routedFetch({
        [`${BASE_URL}/api/documents/5/`]: json({ id: 5 }),
      });

      await expect(createClient(fetchImpl).patchTitle(5, 'acme_invoice_2023')).resolves.toBe(true);
      expect(requests[0].init.method).toBe('PATCH');
      expect(requests[0].init.body).toBe('{"title":"acme_invoice_2023"}');
    });

    it('reports a failed write as false', async () => {
      const { fetchImpl } = routedFetch({});

      await expect(createClient(fetchImpl).patchContent(5, 'text')).resolves.toBe(false);
    });

    it('writes custom fields as a list of field/value pairs', async () => {
      const { fetchImpl, requests } = routedFetch({
        [`${BASE_URL}/api/documents/5/`]: json({ id: 5 }),
      });

      await createClient(fetchImpl).patchCustomFields(5, [{ field: 3, value: 1700000000 }]);

      expect(requests[0].init.body).toBe('{"custom_fields":[{"field":3,"value":1700000000}]}');
    });
  });

  describe('findSimilar', () => {
    it('queries by more_like_id and leaves the document itself out', async () => {
      const url = `${BASE_URL}/api/documents/?more_like_id=8&ordering=-score&page_size=5`;
      const { fetchImpl } = routedFetch({
        [url]: json({
          count: 3,
          next: null,
          results: [
            { id: 8, title: 'self', __search_hit__: { score: 10 } },
            { id: 2, title: 'acme_invoice_2022', __search_hit__: { score: 4.5 } },
            { id: 6, title: 'acme_invoice_2021' },
          ],
        }),
      });

      await expect(createClient(fetchImpl).findSimilar(8)).resolves.toEqual([
        { id: 2, title: 'acme_invoice_2022', score: 4.5 },
        { id: 6, title: 'acme_invoice_2021', score: 0 },
      ]);
    });

    it('returns an empty list when the search fails', async () => {
      const { fetchImpl } = routedFetch({});

      await expect(createClient(fetchImpl).findSimilar(8)).resolves.toEqual([]);
    });
  });

  describe('custom fields', () => {
    it('lists custom fields across pages', async () => {
      const { fetchImpl } = routedFetch({
        [`${BASE_URL}/api/custom_fields/`]: json({
          count: 2,
          next: `${BASE_URL}/api/custom_fields/?page=2`,
          results: [{ id: 1, name: 'invoice_number', data_type: 'string' }],
        }),
        [`${BASE_URL}/api/custom_fields/?page=2`]: json({
          count: 2,
          next: null,
          results: [{ id: 3, name: 'mistral_processed', data_type: 'integer' }],
        }),
      });

      const fields = await createClient(fetchImpl).listCustomFields();

      expect(fields?.map((field) => field.name)).toEqual(['invoice_number', 'mistral_processed']);
    });

    it('creates an optional integer field and returns its id', async () => {
      const { fetchImpl, requests } = routedFetch({
        [`${BASE_URL}/api/custom_fields/`]: json({ id: 11, name: 'mistral_processed' }),
      });

      await expect(createClient(fetchImpl).createCustomField('mistral_processed')).resolves.toBe(11);
      expect(requests[0].init.method).toBe('POST');
      expect(requests[0].init.body).toBe('{"name":"mistral_processed","data_type":"integer","required":false}');
    });
  });
});
