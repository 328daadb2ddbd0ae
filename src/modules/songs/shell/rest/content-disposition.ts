const COMBINING_MARKS = /[\u0300-\u036f]/g;
const NON_PRINTABLE_ASCII = /[^\x20-\x7e]/g;
const QUOTE_OR_BACKSLASH = /["\\]/g;

/**
 * `attachment` disposition carrying the original file name twice: a quoted
 * ASCII approximation for old clients and the exact UTF-8 name (RFC 5987).
 */
export const buildContentDisposition = (filename: string): string => {
  const asciiName = filename
    .normalize('NFKD')
    .replace(COMBINING_MARKS, '')
    .replace(NON_PRINTABLE_ASCII, '_')
    .replace(QUOTE_OR_BACKSLASH, '_')
    .trim();

  const fallback = asciiName !== '' ? asciiName : 'download';
  const encoded = encodeURIComponent(filename).replace(
    /['()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  );

  return `attachment; filename="${fallback}"; filename*=UTF-8''${encoded}`;
};
