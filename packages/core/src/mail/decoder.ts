import iconv from 'iconv-lite';
import { simpleParser, type AddressObject, type Headers, type ParsedMail } from 'mailparser';
import { debug } from '../debug.js';
import { MalformedMessageError } from '../errors.js';
import type { EmailContent } from './types.js';

const RE_FOLDED_LINE = /\r?\n(?=[ \t])/g;
const RE_LINE_BREAK = /\r?\n/;

const PARSER_OPTIONS = {
  skipHtmlToText: true,
  skipTextToHtml: true,
  skipImageLinks: true,
  skipTextLinks: true,
};

/** One MIME entity: its raw bytes plus what the parser made of them. */
interface MimeNode {
  raw: Buffer;
  parsed: ParsedMail;
  contentType: string;
  boundary?: string;
}

interface ContentType {
  value: string;
  params: Record<string, string>;
}

function headerSection(raw: Buffer): { end: number; bodyStart: number } {
  if (raw.subarray(0, 2).equals(Buffer.from('\r\n'))) return { end: 0, bodyStart: 2 };
  if (raw[0] === 0x0a) return { end: 0, bodyStart: 1 };
  const crlf = raw.indexOf('\r\n\r\n');
  const lf = raw.indexOf('\n\n');
  if (crlf !== -1 && (lf === -1 || crlf < lf)) return { end: crlf, bodyStart: crlf + 4 };
  if (lf !== -1) return { end: lf, bodyStart: lf + 2 };
  return { end: raw.length, bodyStart: raw.length };
}

function contentTypeOf(headers: Headers): ContentType {
  const header = headers.get('content-type');
  if (typeof header === 'object' && !Array.isArray(header) && !(header instanceof Date) && 'params' in header) {
    return { value: header.value.toLowerCase(), params: header.params };
  }
  return { value: 'text/plain', params: {} };
}

async function parseNode(raw: Buffer): Promise<MimeNode> {
  let parsed: ParsedMail;
  try {
    parsed = await simpleParser(raw, PARSER_OPTIONS);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedMessageError(reason, { cause: err });
  }
  const { value, params } = contentTypeOf(parsed.headers);
  return { raw, parsed, contentType: value, boundary: params.boundary };
}

/**
 * Cuts a multipart body at its delimiter lines. The line break before a
 * delimiter belongs to the delimiter; an unterminated last part is kept.
 */
function splitMultipart(body: Buffer, boundary: string): Buffer[] {
  const delimiter = `--${boundary}`;
  const closing = `${delimiter}--`;
  const parts: Buffer[] = [];
  let current: string[] | undefined;

  // latin1 maps bytes to code units one to one, so payloads survive the round trip
  for (const line of body.toString('latin1').split(RE_LINE_BREAK)) {
    const marker = line.trimEnd();
    if (marker === delimiter || marker === closing) {
      if (current) parts.push(Buffer.from(current.join('\n'), 'latin1'));
      if (marker === closing) return parts;
      current = [];
    } else {
      current?.push(line);
    }
  }
  if (current) parts.push(Buffer.from(current.join('\n'), 'latin1'));
  return parts;
}

async function childrenOf(node: MimeNode): Promise<MimeNode[]> {
  if (!node.contentType.startsWith('multipart/') || !node.boundary) return [];
  const body = node.raw.subarray(headerSection(node.raw).bodyStart);
  const children: MimeNode[] = [];
  for (const part of splitMultipart(body, node.boundary)) {
    children.push(await parseNode(part));
  }
  return children;
}

function decodeCharset(bytes: Buffer, headers: Headers): string {
  const charset = contentTypeOf(headers).params.charset;
  return iconv.decode(bytes, charset && iconv.encodingExists(charset) ? charset : 'utf-8');
}

/** The decoded payload of a leaf entity, whether inline or an attachment. */
function payloadOf(node: MimeNode): string {
  const { parsed } = node;
  if (parsed.text) return parsed.text;
  if (parsed.html) return parsed.html;
  const attachment = parsed.attachments[0];
  return attachment ? decodeCharset(attachment.content, attachment.headers) : '';
}

/**
 * Depth-first search for the first entity of the given type with a
 * non-empty payload. Attachments count; embedded messages are entered.
 */
async function findPart(node: MimeNode, type: string): Promise<string | undefined> {
  if (node.contentType.startsWith('multipart/')) {
    for (const child of await childrenOf(node)) {
      const found = await findPart(child, type);
      if (found) return found;
    }
    return undefined;
  }
  if (node.contentType === 'message/rfc822') {
    return findPart(await parseNode(node.raw.subarray(headerSection(node.raw).bodyStart)), type);
  }
  if (node.contentType !== type) return undefined;
  return payloadOf(node) || undefined;
}

/**
 * The text the pipeline analyzes: the first `text/plain` payload, else the
 * first sub-part of a multipart message, else the payload of a single-part
 * message of any type.
 */
async function extractBody(root: MimeNode): Promise<string> {
  const plain = await findPart(root, 'text/plain');
  if (plain !== undefined) return plain;
  if (root.contentType.startsWith('multipart/')) {
    const [first] = await childrenOf(root);
    if (!first || first.contentType.startsWith('multipart/') || first.contentType === 'message/rfc822') return '';
    return payloadOf(first);
  }
  return payloadOf(root);
}

function addressTexts(value: AddressObject | AddressObject[] | undefined): string[] {
  if (!value) return [];
  return (Array.isArray(value) ? value : [value]).map((a) => a.text);
}

function serializeHeaders(parsed: ParsedMail): string {
  return parsed.headerLines.map((h) => h.line.replace(RE_FOLDED_LINE, '')).join('\n');
}

/**
 * Decodes an RFC822 message into the fields the analyzer reads. Partially
 * malformed messages decode best-effort; only input that is not a mail
 * message at all is rejected.
 */
export async function decodeMessage(raw: Buffer | string): Promise<EmailContent> {
  const buffer = typeof raw === 'string' ? Buffer.from(raw, 'utf8') : raw;

  // Binary payloads (archives, images) carry NUL bytes; mail headers never do
  if (buffer.subarray(0, headerSection(buffer).end).includes(0)) {
    throw new MalformedMessageError('binary content in header section');
  }

  const root = await parseNode(buffer);
  const { parsed } = root;
  const multipart = root.contentType.startsWith('multipart/');
  const content: EmailContent = {
    subject: parsed.subject,
    body: await extractBody(root),
    rawHeaders: serializeHeaders(parsed),
    fromAddress: parsed.from?.text,
    replyTo: parsed.replyTo?.text,
    toAddresses: addressTexts(parsed.to),
    htmlBody: multipart ? await findPart(root, 'text/html') : undefined,
  };

  debug('decoder', `decoded ${buffer.length} bytes (multipart=${multipart}, headers=${parsed.headerLines.length})`);
  return content;
}
