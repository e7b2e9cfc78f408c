import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { parseConfig } from '../config.js';
import { DigestMailer } from './client.js';
import type { DigestMessage } from './digest.js';

const transport = vi.hoisted(() => ({
  sendMail: vi.fn(),
  close: vi.fn(),
  createTransport: vi.fn(),
}));

vi.mock('nodemailer', () => ({
  default: {
    createTransport: transport.createTransport,
  },
}));

const digest: DigestMessage = {
  subject: '[ApartmentBot] 1 new listing(s) — Troy',
  html: '<p>hi</p>',
  text: 'hi',
  attachments: [{ filename: 'listing-0.jpg', content: Buffer.from('jpg'), contentType: 'image/jpeg', cid: 'listing-0' }],
};

describe('DigestMailer', () => {
  beforeEach(() => {
    transport.createTransport.mockReturnValue({ sendMail: transport.sendMail, close: transport.close });
    vi.stubEnv('EMAIL_USER', 'bot@example.test');
    vi.stubEnv('EMAIL_PASSWORD', 'test-secret');
    vi.stubEnv('RECIPIENT_EMAIL', 'me@example.test');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.clearAllMocks();
  });

  it('sends the digest with its inline attachment', async () => {
    transport.sendMail.mockResolvedValue({ messageId: '<abc@example.test>' });
    const mailer = new DigestMailer(parseConfig({}).email);

    const result = await mailer.dispatch(digest);

    expect(result).toEqual({ ok: true, messageId: '<abc@example.test>' });
    expect(transport.createTransport).toHaveBeenCalledWith({
      host: 'smtp.gmail.com',
      port: 465,
      secure: true,
      auth: { user: 'bot@example.test', pass: 'test-secret' },
    });
    expect(transport.sendMail).toHaveBeenCalledWith({
      from: '"ApartmentBot" <bot@example.test>',
      to: 'me@example.test',
      subject: digest.subject,
      text: 'hi',
      html: '<p>hi</p>',
      attachments: [{ filename: 'listing-0.jpg', content: Buffer.from('jpg'), contentType: 'image/jpeg', cid: 'listing-0' }],
    });

    mailer.close();
    expect(transport.close).toHaveBeenCalledTimes(1);
  });

  it('reports a missing recipient instead of throwing', async () => {
    vi.stubEnv('RECIPIENT_EMAIL', '');
    const mailer = new DigestMailer(parseConfig({}).email);

    const result = await mailer.dispatch(digest);

    expect(result).toEqual({ ok: false, reason: 'Missing required environment variable: RECIPIENT_EMAIL' });
    expect(transport.sendMail).not.toHaveBeenCalled();
  });

  it('reports a transport rejection', async () => {
    transport.sendMail.mockRejectedValue(new Error('Invalid login: 535 Authentication failed'));
    const mailer = new DigestMailer(parseConfig({}).email);

    expect(await mailer.dispatch(digest)).toEqual({ ok: false, reason: 'Invalid login: 535 Authentication failed' });
  });
});
