import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { ARRAY_ELEMENT_PATHS, ENVELOPE_ROOT } from './constants';
import { CodecErrorFactory } from './errors';

/** Single, shared parser config for the whole package.
 *  NOTE: field kinds and schemas should NOT import fast-xml-parser directly.
 *  Tag values stay text so leading zeros and long ids survive; kinds convert.
 */
export const xmlParser = new XMLParser({
    ignoreAttributes: true,
    ignoreDeclaration: true,
    parseTagValue: false,
    trimValues: true,
    isArray: (_tagName: string, jPath: string) => ARRAY_ELEMENT_PATHS.has(jPath),
});

/** Helpers shared with the field kinds */
export function toArray<T>(v: T | T[] | undefined | null): T[] {
    if (v === undefined || v === null) return [];
    return Array.isArray(v) ? v : [v];
}
export function isPlainObject(v: unknown): v is Record<string, unknown> {
    return typeof v === 'object' && v !== null && !Array.isArray(v) && Object.getPrototypeOf(v) === Object.prototype;
}

/** -------- Envelope parsing -------- */

/**
 * Parse an envelope into its element map (the children of `<xml>`).
 * Throws EnvelopeDecodeError for malformed syntax or a missing root.
 */
export function parseEnvelope(xml: string): Record<string, unknown> {
    const result = XMLValidator.validate(xml);
    if (result !== true) {
        const { msg, line } = result.err;
        throw CodecErrorFactory.envelope(`${msg} (line ${line})`, xml);
    }

    const doc: unknown = xmlParser.parse(xml);
    const root = isPlainObject(doc) ? doc[ENVELOPE_ROOT] : undefined;
    if (!isPlainObject(root)) {
        throw CodecErrorFactory.envelope(`missing <${ENVELOPE_ROOT}> root element`, xml);
    }
    return root;
}

/** Text content of a leaf node; nested elements yield undefined */
export function leafText(node: unknown): string | undefined {
    if (typeof node === 'string') return node;
    if (typeof node === 'number' || typeof node === 'boolean') return String(node);
    return undefined;
}

/** -------- Fragment builders -------- */

export function cdata(text: string): string {
    // "]]>" cannot appear inside one section
    return `<![CDATA[${text.split(']]>').join(']]]]><![CDATA[>')}]]>`;
}

export function textElement(name: string, text: string): string {
    return `<${name}>${cdata(text)}</${name}>`;
}

export function rawElement(name: string, inner: string): string {
    return `<${name}>${inner}</${name}>`;
}
