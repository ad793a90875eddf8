import nock from 'nock';
import { BaseError } from '../errors';
import { fetchHead, fetchText, fetchTextPrefix, HttpRequestError } from '../http';

const BASE_URL = 'https://example.com';

describe('http utilities', () => {
  afterEach(() => {
    nock.cleanAll();
  });

  describe('fetchHead', () => {
    it('returns the status and a lowercased content type', async () => {
      nock(BASE_URL).head('/news').reply(200, '', { 'Content-Type': 'Application/RSS+XML; charset=UTF-8' });

      const result = await fetchHead(`${BASE_URL}/news`, { timeout: 1000 });

      expect(result.status).toBe(200);
      expect(result.contentType).toBe('application/rss+xml; charset=utf-8');
    });

    it('reports an empty content type when the header is missing', async () => {
      nock(BASE_URL).head('/bare').reply(204);

      const result = await fetchHead(`${BASE_URL}/bare`);

      expect(result.contentType).toBe('');
    });
  });

  describe('fetchText', () => {
    it('sends the given headers and returns the body', async () => {
      nock(BASE_URL, { reqheaders: { 'user-agent': 'test-agent/1.0' } })
        .get('/page')
        .reply(200, '<html><body>hello</body></html>');

      const body = await fetchText(`${BASE_URL}/page`, { headers: { 'User-Agent': 'test-agent/1.0' } });

      expect(body).toBe('<html><body>hello</body></html>');
    });

    it('throws HttpRequestError for a non-2xx status', async () => {
      nock(BASE_URL).get('/missing').reply(503, 'unavailable');

      const error = await fetchText(`${BASE_URL}/missing`).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(HttpRequestError);
      expect(error).toBeInstanceOf(BaseError);
      expect(error).toMatchObject({ status: 503, method: 'GET', url: `${BASE_URL}/missing` });
    });

    it('surfaces connection failures', async () => {
      nock(BASE_URL).get('/reset').replyWithError('connection reset');

      await expect(fetchText(`${BASE_URL}/reset`)).rejects.toThrow();
    });
  });

  describe('fetchTextPrefix', () => {
    it('returns at most the requested number of bytes', async () => {
      nock(BASE_URL).get('/large').reply(200, 'a'.repeat(12000));

      const sample = await fetchTextPrefix(`${BASE_URL}/large`, 5000);

      expect(sample).toHaveLength(5000);
    });

    it('returns the whole body when it is shorter than the limit', async () => {
      nock(BASE_URL).get('/small').reply(200, '<rss version="2.0"></rss>');

      const sample = await fetchTextPrefix(`${BASE_URL}/small`, 5000);

      expect(sample).toBe('<rss version="2.0"></rss>');
    });

    it('reads the body of an error response too', async () => {
      nock(BASE_URL).get('/gone').reply(404, 'not here');

      const sample = await fetchTextPrefix(`${BASE_URL}/gone`, 5000);

      expect(sample).toBe('not here');
    });
  });
});
