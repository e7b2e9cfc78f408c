import axios, { type AxiosInstance } from 'axios';

/** Fetch a page body as text. Injected into adapters so tests never hit the network. */
export type HttpGetter = (url: string, timeoutMs?: number) => Promise<string>;

/** Fetch binary content such as the digest's inline image. */
export type BinaryGetter = (url: string, timeoutMs?: number) => Promise<{ content: Buffer; contentType: string | null }>;

export const http: AxiosInstance = axios.create({
  timeout: 20000,
  headers: {
    'User-Agent': 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36',
    'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
    'Cache-Control': 'no-cache',
    'Pragma': 'no-cache',
  },
  maxRedirects: 5,
  validateStatus: (s) => !!s && s >= 200 && s < 300,
});

export const getText: HttpGetter = async (url, timeoutMs) => {
  let referer: string | undefined;
  try { referer = new URL(url).origin; } catch { /* relative or malformed; axios reports it */ }
  const resp = await http.get<string>(url, {
    timeout: timeoutMs ?? http.defaults.timeout,
    headers: referer ? { Referer: referer } : undefined,
    responseType: 'text',
  });
  return typeof resp.data === 'string' ? resp.data : JSON.stringify(resp.data);
};

export const getBinary: BinaryGetter = async (url, timeoutMs) => {
  const resp = await http.get<ArrayBuffer>(url, {
    timeout: timeoutMs ?? 12000,
    responseType: 'arraybuffer',
  });
  const contentType = resp.headers['content-type'];
  return {
    content: Buffer.from(resp.data),
    contentType: typeof contentType === 'string' ? contentType : null,
  };
};
