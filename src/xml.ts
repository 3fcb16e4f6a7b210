import { XMLParser, XMLValidator } from 'fast-xml-parser';

export interface XmlElement {
    type: 'element';
    name: string; // local name, namespace prefix removed
    attributes: Record<string, string>;
    children: XmlNode[];
}

export interface XmlText {
    type: 'text';
    value: string;
}

export type XmlNode = XmlElement | XmlText;

// An extraction strategy: pure lookup that yields nothing when its vendor shape is absent.
export type Strategy<I, O> = (input: I) => O | undefined;

const TEXT_KEY = '#text';
const ATTRIBUTES_KEY = ':@';

const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: '',
    removeNSPrefix: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: false,
    processEntities: true,
    htmlEntities: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toAttributes(raw: unknown): Record<string, string> {
    const attributes: Record<string, string> = {};
    if (isRecord(raw)) {
        for (const [key, value] of Object.entries(raw)) {
            attributes[key] = String(value);
        }
    }
    return attributes;
}

function toNodes(raw: unknown): XmlNode[] {
    if (!Array.isArray(raw)) {
        return [];
    }
    const items: readonly unknown[] = raw;
    const nodes: XmlNode[] = [];

    for (const item of items) {
        if (!isRecord(item)) continue;
        for (const [key, value] of Object.entries(item)) {
            if (key === ATTRIBUTES_KEY || key.startsWith('?')) continue;
            if (key === TEXT_KEY) {
                nodes.push({ type: 'text', value: String(value) });
                continue;
            }
            nodes.push({
                type: 'element',
                name: key,
                attributes: toAttributes(item[ATTRIBUTES_KEY]),
                children: toNodes(value),
            });
        }
    }
    return nodes;
}

/**
 * Parses XML into an ordered node tree. Namespace prefixes are dropped so that
 * `reqif:SPEC-OBJECT` and `SPEC-OBJECT` look the same to every lookup below.
 * Throws when the parser gives up on the input.
 */
export function parseXml(text: string): XmlNode[] {
    return toNodes(parser.parse(text));
}

export function isWellFormed(text: string): boolean {
    return XMLValidator.validate(text) === true;
}

export function isElement(node: XmlNode): node is XmlElement {
    return node.type === 'element';
}

export function nameIs(element: XmlElement, name: string): boolean {
    return element.name.toUpperCase() === name.toUpperCase();
}

export function nameStartsWith(element: XmlElement, prefix: string): boolean {
    return element.name.toUpperCase().startsWith(prefix.toUpperCase());
}

export function nameEndsWith(element: XmlElement, suffix: string): boolean {
    return element.name.toUpperCase().endsWith(suffix.toUpperCase());
}

export function childElements(element: XmlElement, predicate?: (child: XmlElement) => boolean): XmlElement[] {
    return element.children.filter(isElement).filter(child => !predicate || predicate(child));
}

export function childNamed(element: XmlElement, name: string): XmlElement | undefined {
    return childElements(element).find(child => nameIs(child, name));
}

export function childrenNamed(element: XmlElement, name: string): XmlElement[] {
    return childElements(element, child => nameIs(child, name));
}

function nodesOf(roots: XmlElement | readonly XmlNode[]): readonly XmlNode[] {
    return 'children' in roots ? roots.children : roots;
}

/** Every matching element below `roots`, in document order, including matches nested in matches. */
export function descendants(roots: XmlElement | readonly XmlNode[], predicate: (element: XmlElement) => boolean): XmlElement[] {
    const found: XmlElement[] = [];
    const visit = (nodes: readonly XmlNode[]) => {
        for (const node of nodes) {
            if (!isElement(node)) continue;
            if (predicate(node)) found.push(node);
            visit(node.children);
        }
    };
    visit(nodesOf(roots));
    return found;
}

/** Like `descendants`, but does not look inside an element once it matched. */
export function outermost(roots: XmlElement | readonly XmlNode[], predicate: (element: XmlElement) => boolean): XmlElement[] {
    const found: XmlElement[] = [];
    const visit = (nodes: readonly XmlNode[]) => {
        for (const node of nodes) {
            if (!isElement(node)) continue;
            if (predicate(node)) {
                found.push(node);
            } else {
                visit(node.children);
            }
        }
    };
    visit(nodesOf(roots));
    return found;
}

export function attribute(element: XmlElement, name: string): string | undefined {
    const wanted = name.toUpperCase();
    for (const [key, value] of Object.entries(element.attributes)) {
        if (key.toUpperCase() === wanted) return value;
    }
    return undefined;
}

export function textContent(node: XmlNode): string {
    if (!isElement(node)) return node.value;
    return node.children.map(textContent).join('');
}

export function nonEmpty(value: string | undefined): string | undefined {
    if (value === undefined) return undefined;
    const trimmed = value.trim();
    return trimmed === '' ? undefined : trimmed;
}

export function firstOf<I, O>(input: I, strategies: readonly Strategy<I, O>[]): O | undefined {
    for (const strategy of strategies) {
        const result = strategy(input);
        if (result !== undefined) return result;
    }
    return undefined;
}
