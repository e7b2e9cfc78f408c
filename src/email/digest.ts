import { getBinary, type BinaryGetter } from '../scrapers/http.js';
import { SITE_LABELS, UNKNOWN_BEDROOMS, type Bedrooms, type ListingRecord } from '../listings/types.js';

export const INLINE_IMAGE_CID = 'listing-0';

export interface InlineImage {
  filename: string;
  content: Buffer;
  contentType?: string;
  cid: string;
}

export interface DigestMessage {
  subject: string;
  html: string;
  text: string;
  attachments: InlineImage[];
}

export interface DigestOptions {
  towns: readonly string[];
  fromName?: string;
  now?: Date;
  fetchImage?: BinaryGetter;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** Only http(s) URLs make it into href/src attributes. */
function safeUrl(url: string | undefined): string | null {
  if (!url) return null;
  try {
    const u = new URL(url);
    return u.protocol === 'http:' || u.protocol === 'https:' ? u.toString() : null;
  } catch {
    return null;
  }
}

export function formatPrice(price: number): string {
  return `$${price.toLocaleString('en-US')}`;
}

export function formatBedrooms(bedrooms: Bedrooms): string {
  if (bedrooms === UNKNOWN_BEDROOMS) return '? bd';
  if (bedrooms === 0) return 'Studio';
  return `${bedrooms} bd`;
}

function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

function extensionFor(contentType: string | null): string {
  if (!contentType) return 'jpg';
  if (contentType.includes('png')) return 'png';
  if (contentType.includes('webp')) return 'webp';
  if (contentType.includes('gif')) return 'gif';
  return 'jpg';
}

async function fetchInlineImage(url: string, fetchImage: BinaryGetter): Promise<InlineImage | null> {
  try {
    const { content, contentType } = await fetchImage(url);
    if (content.length === 0) return null;
    return {
      filename: `${INLINE_IMAGE_CID}.${extensionFor(contentType)}`,
      content,
      ...(contentType ? { contentType } : {}),
      cid: INLINE_IMAGE_CID,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[digest] inline image ${url} not fetched (${message}); using a thumbnail instead`);
    return null;
  }
}

function renderListing(listing: ListingRecord, imageHtml: string): string {
  const link = safeUrl(listing.url);
  const title = escapeHtml(listing.title || 'No title');
  const heading = link ? `<a href="${escapeHtml(link)}" target="_blank">${title}</a>` : title;
  const facts = [
    formatPrice(listing.price),
    formatBedrooms(listing.bedrooms),
    escapeHtml(listing.location),
  ].join(' · ');

  return [
    '<div style="padding:10px;border:1px solid #eee;border-radius:6px;margin-bottom:10px;">',
    `<h3 style="margin:0 0 6px 0;">${heading}</h3>`,
    `<div style="font-weight:600;margin-bottom:8px;">${facts} — ${SITE_LABELS[listing.source]}</div>`,
    imageHtml,
    listing.description ? `<div style="margin-top:6px;">${escapeHtml(listing.description)}</div>` : '',
    link ? `<div style="margin-top:6px;font-size:12px;color:#666;">${escapeHtml(link)}</div>` : '',
    '</div>',
  ].filter(Boolean).join('\n');
}

function thumbnailHtml(listing: ListingRecord): string {
  const src = safeUrl(listing.imageUrls[0]);
  if (!src) return '';
  const img = `<img src="${escapeHtml(src)}" alt="" style="width:120px;height:auto;border-radius:3px;"/>`;
  const link = safeUrl(listing.url);
  return `<div style="margin-top:8px;">${link ? `<a href="${escapeHtml(link)}" target="_blank">${img}</a>` : img}</div>`;
}

/**
 * Build the single digest email for a run. The first listing's first image
 * is attached inline (the only network call made here); every other image
 * is referenced as a thumbnail.
 */
export async function composeDigest(novel: readonly ListingRecord[], options: DigestOptions): Promise<DigestMessage> {
  if (novel.length === 0) {
    throw new Error('A digest needs at least one listing');
  }

  const now = options.now ?? new Date();
  const fetchImage = options.fetchImage ?? getBinary;
  const attachments: InlineImage[] = [];

  const firstImage = safeUrl(novel[0].imageUrls[0]);
  if (firstImage) {
    const inline = await fetchInlineImage(firstImage, fetchImage);
    if (inline) attachments.push(inline);
  }

  const blocks = novel.map((listing, i) => {
    if (i === 0 && attachments.length > 0) {
      const alt = escapeHtml(listing.title);
      return renderListing(
        listing,
        `<div><img src="cid:${INLINE_IMAGE_CID}" alt="${alt}" style="max-width:420px;height:auto;margin-bottom:8px;"/></div>`
      );
    }
    return renderListing(listing, thumbnailHtml(listing));
  });

  const fromName = options.fromName ?? 'ApartmentBot';
  const count = `${novel.length} new listing(s)`;

  const html = [
    '<html><body>',
    `<p>Found ${count} at ${formatTimestamp(now)}</p>`,
    ...blocks,
    `<hr><p>${escapeHtml(fromName)}</p>`,
    '</body></html>',
  ].join('\n');

  const text = [
    `Found ${count} at ${formatTimestamp(now)}`,
    '',
    ...novel.map((listing, i) =>
      `${i + 1}. ${listing.title} — ${formatPrice(listing.price)} · ${formatBedrooms(listing.bedrooms)} · ${listing.location} (${SITE_LABELS[listing.source]})\n   ${listing.url}`
    ),
  ].join('\n');

  return {
    subject: `[${fromName}] ${count} — ${options.towns.join(', ')}`,
    html,
    text,
    attachments,
  };
}
