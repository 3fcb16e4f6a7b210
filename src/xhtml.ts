import { XmlNode, isElement, isWellFormed, parseXml } from './xml';

// Elements that start a new line of plain text
const BLOCK_ELEMENTS = new Set([
    'ADDRESS', 'ARTICLE', 'BLOCKQUOTE', 'BR', 'CAPTION', 'DD', 'DIV', 'DL', 'DT',
    'H1', 'H2', 'H3', 'H4', 'H5', 'H6', 'HR', 'LI', 'OL', 'P', 'PRE', 'SECTION',
    'TABLE', 'TBODY', 'THEAD', 'TFOOT', 'TR', 'UL',
]);

// Elements whose content is separated from its neighbours by a space
const CELL_ELEMENTS = new Set(['TD', 'TH']);

const ENTITIES = new Map<string, string>([
    ['amp', '&'],
    ['lt', '<'],
    ['gt', '>'],
    ['quot', '"'],
    ['apos', "'"],
    ['nbsp', ' '],
]);

function collapse(lines: string[]): string {
    return lines
        .map(line => line.replace(/\s+/g, ' ').trim())
        .filter(line => line !== '')
        .join('\n');
}

/**
 * Plain text of already-parsed XHTML nodes, in reading order.
 * Block elements end up on their own lines; whitespace inside a line is collapsed.
 */
export function normalizeXhtmlNodes(nodes: readonly XmlNode[]): string {
    const lines: string[] = [''];

    const breakLine = () => {
        if (lines[lines.length - 1] !== '') lines.push('');
    };
    const append = (text: string) => {
        lines[lines.length - 1] += text;
    };

    const visit = (node: XmlNode) => {
        if (!isElement(node)) {
            append(node.value);
            return;
        }
        const name = node.name.toUpperCase();
        const block = BLOCK_ELEMENTS.has(name);
        if (block) breakLine();
        if (CELL_ELEMENTS.has(name)) append(' ');
        node.children.forEach(visit);
        if (CELL_ELEMENTS.has(name)) append(' ');
        if (block) breakLine();
    };

    nodes.forEach(visit);
    return collapse(lines);
}

function decodeEntities(text: string): string {
    return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
        if (entity.startsWith('#')) {
            const hex = entity[1] === 'x' || entity[1] === 'X';
            const codePoint = parseInt(entity.slice(hex ? 2 : 1), hex ? 16 : 10);
            return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : match;
        }
        return ENTITIES.get(entity.toLowerCase()) ?? match;
    });
}

/**
 * Best-effort text for markup the parser cannot handle. Only tags, comments and
 * processing instructions are dropped; a `<` not followed by a tag name is text.
 */
export function stripMarkup(markup: string): string {
    const text = markup
        .replace(/<\s*br\s*\/?\s*>/gi, '\n')
        .replace(/<\/?\s*(p|div|li|ul|ol|tr|table|h[1-6]|blockquote|pre|section)\b[^>]*>/gi, '\n')
        .replace(/<\/?\s*(td|th)\b[^>]*>/gi, ' ')
        .replace(/<!--[\s\S]*?(-->|$)/g, '')
        .replace(/<\?[\s\S]*?(\?>|$)/g, '')
        .replace(/<![A-Za-z[][^<>]*>?/g, '')
        .replace(/<\/?[A-Za-z][^<>]*>?/g, '');
    return collapse(decodeEntities(text).split('\n'));
}

/**
 * Converts a fragment of (X)HTML to plain text. Never throws: fragments that are
 * not well-formed go through `stripMarkup` instead of the parser.
 */
export function normalizeXhtml(markup: string): string {
    const wrapped = `<fragment>${markup}</fragment>`;
    if (!isWellFormed(wrapped)) {
        return stripMarkup(markup);
    }
    try {
        return normalizeXhtmlNodes(parseXml(wrapped));
    } catch {
        return stripMarkup(markup);
    }
}
