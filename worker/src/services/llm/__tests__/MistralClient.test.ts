import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { HttpClient, type FetchLike } from '../../../http/HttpClient';
import { MistralClient, buildBearerHeaders } from '../MistralClient';

const BASE_URL = 'http://mistral.test';

function scriptedFetch(reply: (url: string, init: RequestInit) => Response) {
  const requests: Array<{ url: string; init: RequestInit }> = [];
  const fetchImpl: FetchLike = async (url, init) => {
    requests.push({ url, init });
    return reply(url, init);
  };
  return { fetchImpl, requests };
}

const json = (body: unknown) =>
  new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } });

function createClient(fetchImpl: FetchLike): MistralClient {
  const http = new HttpClient({ fetchImpl, headers: buildBearerHeaders('test-secret'), sleep: async () => {} });
  return new MistralClient({ baseUrl: `${BASE_URL}/`, model: 'test-chat-model', http });
}

describe('MistralClient', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('completeJson', () => {
    it('requests JSON mode and returns the first choice', async () => {
      const { fetchImpl, requests } = scriptedFetch(() =>
        json({ choices: [{ message: { content: '{"is_garbage":false}' } }] })
      );

      const result = await createClient(fetchImpl).completeJson([{ role: 'user', content: 'hello' }], {
        maxTokens: 100,
      });

      expect(result).toBe('{"is_garbage":false}');
      expect(requests[0].url).toBe(`${BASE_URL}/v1/chat/completions`);
      expect(requests[0].init.headers).toEqual({
        Authorization: 'Bearer test-secret',
        'Content-Type': 'application/json',
      });
      expect(JSON.parse(String(requests[0].init.body))).toEqual({
        model: 'test-chat-model',
        messages: [{ role: 'user', content: 'hello' }],
        response_format: { type: 'json_object' },
        max_tokens: 100,
      });
    });

    it('leaves max_tokens out when no limit is set', async () => {
      const { fetchImpl, requests } = scriptedFetch(() => json({ choices: [{ message: { content: '{}' } }] }));

      await createClient(fetchImpl).completeJson([{ role: 'user', content: 'hello' }]);

      expect(JSON.parse(String(requests[0].init.body))).not.toHaveProperty('max_tokens');
    });

    it('joins chunked message content', async () => {
      const { fetchImpl } = scriptedFetch(() =>
        json({
          choices: [
            {
              message: {
                content: [
                  { type: 'text', text: '{"title":' },
                  { type: 'text', text: '"acme"}' },
                ],
              },
            },
          ],
        })
      );

      await expect(createClient(fetchImpl).completeJson([{ role: 'user', content: 'x' }])).resolves.toBe(
        '{"title":"acme"}'
      );
    });

    it('returns null when there are no choices or the message is empty', async () => {
      const noChoices = scriptedFetch(() => json({ choices: [] }));
      const empty = scriptedFetch(() => json({ choices: [{ message: { content: '' } }] }));

      await expect(createClient(noChoices.fetchImpl).completeJson([{ role: 'user', content: 'x' }])).resolves.toBeNull();
      await expect(createClient(empty.fetchImpl).completeJson([{ role: 'user', content: 'x' }])).resolves.toBeNull();
    });

    it('returns null when the request keeps failing', async () => {
      const { fetchImpl, requests } = scriptedFetch(() => new Response('rate limited', { status: 429 }));

      await expect(createClient(fetchImpl).completeJson([{ role: 'user', content: 'x' }])).resolves.toBeNull();
      expect(requests).toHaveLength(3);
    });
  });

  describe('files and OCR', () => {
    let directory: string;

    beforeEach(async () => {
      directory = await mkdtemp(path.join(os.tmpdir(), 'retitler-mistral-'));
    });

    afterEach(async () => {
      await rm(directory, { recursive: true, force: true });
    });

    it('uploads a file for OCR as multipart form data', async () => {
      const filePath = path.join(directory, 'document_1.pdf');
      await writeFile(filePath, '%PDF-1.4');
      const { fetchImpl, requests } = scriptedFetch(() => json({ id: 'file-9' }));

      await expect(createClient(fetchImpl).uploadFile(filePath)).resolves.toBe('file-9');

      const form = requests[0].init.body;
      expect(requests[0].url).toBe(`${BASE_URL}/v1/files`);
      expect(form).toBeInstanceOf(FormData);
      expect(form instanceof FormData && form.get('purpose')).toBe('ocr');
    });

    it('returns null for a file it cannot read', async () => {
      const { fetchImpl, requests } = scriptedFetch(() => json({ id: 'file-9' }));

      await expect(createClient(fetchImpl).uploadFile(path.join(directory, 'missing.pdf'))).resolves.toBeNull();
      expect(requests).toHaveLength(0);
    });

    it('asks for a signed URL valid for 24 hours', async () => {
      const { fetchImpl, requests } = scriptedFetch(() => json({ url: 'https://files.test/signed/file-9' }));

      await expect(createClient(fetchImpl).getSignedUrl('file-9')).resolves.toBe('https://files.test/signed/file-9');
      expect(requests[0].url).toBe(`${BASE_URL}/v1/files/file-9/url?expiry=24`);
    });

    it('deletes an uploaded file', async () => {
      const { fetchImpl, requests } = scriptedFetch(() => json({ id: 'file-9', deleted: true }));

      await expect(createClient(fetchImpl).deleteFile('file-9')).resolves.toBe(true);
      expect(requests[0].init.method).toBe('DELETE');
      expect(requests[0].url).toBe(`${BASE_URL}/v1/files/file-9`);
    });

    it('returns the OCR pages', async () => {
      const { fetchImpl, requests } = scriptedFetch(() =>
        json({ pages: [{ index: 0, markdown: '# Invoice' }], model: 'test-ocr-model' })
      );
      const document = { type: 'document_url', document_url: 'https://files.test/signed/file-9' } as const;

      await expect(createClient(fetchImpl).processOcr('test-ocr-model', document)).resolves.toEqual([
        { index: 0, markdown: '# Invoice' },
      ]);
      expect(JSON.parse(String(requests[0].init.body))).toEqual({ model: 'test-ocr-model', document });
    });

    it('returns null for an OCR response without pages', async () => {
      const { fetchImpl } = scriptedFetch(() => json({ error: 'bad document' }));

      await expect(
        createClient(fetchImpl).processOcr('test-ocr-model', { type: 'image_url', image_url: 'data:image/png;base64,' })
      ).resolves.toBeNull();
    });
  });
});
