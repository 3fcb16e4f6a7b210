import * as fs from 'fs';
import * as path from 'path';
import { ArchiveContents, readArchive, isZipArchive } from './archive';
import { ReqifFatalError, errorMessage } from './errors';
import { AttributeKind, EnumValue } from './types';
import { WarningCollector } from './warnings';
import {
    Strategy,
    XmlElement,
    XmlNode,
    attribute,
    childElements,
    childNamed,
    childrenNamed,
    descendants,
    firstOf,
    isElement,
    nameEndsWith,
    nameIs,
    nameStartsWith,
    nonEmpty,
    outermost,
    parseXml,
    textContent,
} from './xml';

export interface RawDatatype {
    identifier: string;
    kind?: AttributeKind;
    enumValues: EnumValue[];
}

export interface RawAttributeDefinition {
    identifier: string;
    name: string;
    kind: AttributeKind;
    datatypeRef?: string;
}

export interface RawValue {
    kind?: AttributeKind; // from the ATTRIBUTE-VALUE-* element name
    definitionRef?: string;
    text: string;
    nodes?: XmlNode[]; // element content of THE-VALUE, for rich text
    enumRefs: string[];
}

export interface RawSpecObject {
    identifier: string;
    name?: string;
    revision?: string;
    values: RawValue[];
}

export interface RawRelation {
    identifier?: string;
    source?: string;
    target?: string;
}

export interface RawHierarchyNode {
    objectRef?: string;
    children: RawHierarchyNode[];
}

export interface RawReqifDocument {
    sources: string[];
    datatypes: RawDatatype[];
    attributeDefinitions: RawAttributeDefinition[];
    specObjects: RawSpecObject[];
    relations: RawRelation[];
    hierarchy: RawHierarchyNode[];
}

const KIND_SUFFIXES: Record<string, AttributeKind> = {
    STRING: 'text',
    INTEGER: 'integer',
    REAL: 'real',
    BOOLEAN: 'boolean',
    DATE: 'date',
    ENUMERATION: 'enumeration',
    XHTML: 'xhtml',
};

const REQIF_EXTENSIONS = ['.reqif', '.reqifz'];

function kindFromName(element: XmlElement, prefix: string): AttributeKind | undefined {
    const name = element.name.toUpperCase();
    if (!name.startsWith(prefix)) return undefined;
    return KIND_SUFFIXES[name.slice(prefix.length)];
}

const isReference = (element: XmlElement) => nameEndsWith(element, '-REF');

// Text of the first *-REF element inside the named child, e.g. <TYPE><X-REF>id</X-REF></TYPE>
function refInside(childName: string): Strategy<XmlElement, string> {
    return element => {
        const container = childNamed(element, childName);
        if (!container) return undefined;
        const ref = childElements(container, isReference)[0];
        return ref ? nonEmpty(textContent(ref)) : undefined;
    };
}

function fromAttribute(name: string): Strategy<XmlElement, string> {
    return element => nonEmpty(attribute(element, name));
}

function fromChildText(name: string): Strategy<XmlElement, string> {
    return element => {
        const child = childNamed(element, name);
        return child ? nonEmpty(textContent(child)) : undefined;
    };
}

const NAME_STRATEGIES = [fromAttribute('LONG-NAME'), fromChildText('LONG-NAME')];

const IDENTIFIER_STRATEGIES = [fromAttribute('IDENTIFIER'), fromAttribute('ID'), fromChildText('IDENTIFIER')];

const ENUM_LABEL_STRATEGIES: Strategy<XmlElement, string>[] = [
    ...NAME_STRATEGIES,
    element => {
        const embedded = descendants(element, child => nameIs(child, 'EMBEDDED-VALUE'))[0];
        return embedded ? nonEmpty(attribute(embedded, 'OTHER-CONTENT')) : undefined;
    },
    fromAttribute('IDENTIFIER'),
];

const DEFINITION_REF_STRATEGIES: Strategy<XmlElement, string>[] = [
    refInside('DEFINITION'),
    element => {
        const definition = childNamed(element, 'DEFINITION');
        return definition ? firstOf(definition, NAME_STRATEGIES) : undefined;
    },
    fromAttribute('DEFINITION'),
    fromAttribute('DEFINITION-REF'),
];

const VALUE_TEXT_STRATEGIES: Strategy<XmlElement, string>[] = [
    fromAttribute('THE-VALUE'),
    fromChildText('THE-VALUE'),
    // Some exports put the value straight into the element, next to DEFINITION
    element => nonEmpty(
        element.children
            .filter(child => !isElement(child) || !(nameIs(child, 'DEFINITION') || nameIs(child, 'VALUES')))
            .map(textContent)
            .join(''),
    ),
];

const RELATION_END_STRATEGIES = (end: 'SOURCE' | 'TARGET'): Strategy<XmlElement, string>[] => [
    refInside(end),
    fromChildText(end),
    fromAttribute(end),
    fromAttribute(`${end}-REF`),
];

const HIERARCHY_OBJECT_STRATEGIES: Strategy<XmlElement, string>[] = [
    refInside('OBJECT'),
    fromChildText('OBJECT'),
    fromAttribute('OBJECT'),
    fromAttribute('OBJECT-REF'),
];

const HIERARCHY_CHILDREN_STRATEGIES: Strategy<XmlElement, XmlElement[]>[] = [
    element => {
        const container = childNamed(element, 'CHILDREN');
        const nodes = container ? childrenNamed(container, 'SPEC-HIERARCHY') : [];
        return nodes.length > 0 ? nodes : undefined;
    },
    element => {
        const nodes = childrenNamed(element, 'SPEC-HIERARCHY');
        return nodes.length > 0 ? nodes : undefined;
    },
];

function readDatatypes(root: XmlElement): RawDatatype[] {
    const datatypes: RawDatatype[] = [];
    const elements = descendants(root, el => nameStartsWith(el, 'DATATYPE-DEFINITION-') && !isReference(el));
    for (const element of elements) {
        const identifier = firstOf(element, IDENTIFIER_STRATEGIES);
        if (!identifier) continue;
        const enumValues: EnumValue[] = [];
        for (const enumElement of descendants(element, el => nameIs(el, 'ENUM-VALUE'))) {
            const id = firstOf(enumElement, IDENTIFIER_STRATEGIES);
            const label = firstOf(enumElement, ENUM_LABEL_STRATEGIES);
            if (id && label) enumValues.push({ identifier: id, label });
        }
        datatypes.push({ identifier, kind: kindFromName(element, 'DATATYPE-DEFINITION-'), enumValues });
    }
    return datatypes;
}

function readAttributeDefinitions(root: XmlElement, warnings: WarningCollector): RawAttributeDefinition[] {
    const definitions: RawAttributeDefinition[] = [];
    const elements = descendants(root, el => nameStartsWith(el, 'ATTRIBUTE-DEFINITION-') && !isReference(el));
    for (const element of elements) {
        const name = firstOf(element, NAME_STRATEGIES);
        const identifier = firstOf(element, IDENTIFIER_STRATEGIES) ?? name;
        if (!identifier) {
            warnings.add('structure', `Skipping ${element.name} without identifier or name`);
            continue;
        }
        const kind = kindFromName(element, 'ATTRIBUTE-DEFINITION-');
        if (!kind) {
            warnings.add('structure', `Unknown attribute definition type ${element.name}, treating as text`, identifier);
        }
        definitions.push({
            identifier,
            name: name ?? identifier,
            kind: kind ?? 'text',
            datatypeRef: firstOf(element, [refInside('TYPE'), fromAttribute('TYPE')]),
        });
    }
    return definitions;
}

function readValue(element: XmlElement): RawValue {
    const kind = kindFromName(element, 'ATTRIBUTE-VALUE-');
    const theValue = childNamed(element, 'THE-VALUE');
    const richContent = theValue && theValue.children.some(isElement) ? theValue.children : undefined;
    const valuesContainer = childNamed(element, 'VALUES');
    const enumRefs = valuesContainer
        ? descendants(valuesContainer, isReference).map(ref => textContent(ref).trim()).filter(ref => ref !== '')
        : [];

    return {
        kind,
        definitionRef: firstOf(element, DEFINITION_REF_STRATEGIES),
        text: firstOf(element, VALUE_TEXT_STRATEGIES) ?? '',
        nodes: richContent,
        enumRefs,
    };
}

function readSpecObjects(root: XmlElement, warnings: WarningCollector): RawSpecObject[] {
    const objects: RawSpecObject[] = [];
    for (const element of descendants(root, el => nameIs(el, 'SPEC-OBJECT'))) {
        const identifier = firstOf(element, IDENTIFIER_STRATEGIES);
        if (!identifier) {
            warnings.add('structure', 'Skipping SPEC-OBJECT without identifier');
            continue;
        }
        const values = descendants(element, el => nameStartsWith(el, 'ATTRIBUTE-VALUE-')).map(readValue);
        objects.push({
            identifier,
            name: firstOf(element, NAME_STRATEGIES),
            revision: firstOf(element, [fromAttribute('LAST-CHANGE'), fromChildText('LAST-CHANGE')]),
            values,
        });
    }
    return objects;
}

function readRelations(root: XmlElement): RawRelation[] {
    const elements = descendants(root, el => nameIs(el, 'SPEC-RELATION') || nameIs(el, 'SPEC-RELATIONSHIP'));
    return elements.map(element => ({
        identifier: firstOf(element, IDENTIFIER_STRATEGIES),
        source: firstOf(element, RELATION_END_STRATEGIES('SOURCE')),
        target: firstOf(element, RELATION_END_STRATEGIES('TARGET')),
    }));
}

function readHierarchyNode(element: XmlElement): RawHierarchyNode {
    const children = firstOf(element, HIERARCHY_CHILDREN_STRATEGIES) ?? [];
    return {
        objectRef: firstOf(element, HIERARCHY_OBJECT_STRATEGIES),
        children: children.map(readHierarchyNode),
    };
}

function readHierarchy(root: XmlElement): RawHierarchyNode[] {
    const roots: XmlElement[] = [];
    for (const specification of descendants(root, el => nameIs(el, 'SPECIFICATION'))) {
        roots.push(...outermost(specification, el => nameIs(el, 'SPEC-HIERARCHY')));
    }
    if (roots.length === 0) {
        // Hierarchy without a SPECIFICATION wrapper
        roots.push(...outermost(root, el => nameIs(el, 'SPEC-HIERARCHY')));
    }
    return roots.map(readHierarchyNode);
}

/**
 * Extracts the raw ReqIF tables from one XML document. Returns undefined when the
 * document has no REQ-IF root; everything else that is missing is only warned about.
 */
export function parseReqifDocument(xml: string, source: string, warnings: WarningCollector): RawReqifDocument | undefined {
    let nodes: XmlNode[];
    try {
        nodes = parseXml(xml);
    } catch (error) {
        warnings.add('structure', `${source}: XML could not be parsed (${errorMessage(error)})`);
        return undefined;
    }

    const root = outermost(nodes, el => nameIs(el, 'REQ-IF'))[0];
    if (!root) {
        warnings.add('structure', `${source}: no REQ-IF root element`);
        return undefined;
    }

    const document: RawReqifDocument = {
        sources: [source],
        datatypes: readDatatypes(root),
        attributeDefinitions: readAttributeDefinitions(root, warnings),
        specObjects: readSpecObjects(root, warnings),
        relations: readRelations(root),
        hierarchy: readHierarchy(root),
    };

    if (document.specObjects.length === 0) {
        warnings.add('structure', `${source}: no SPEC-OBJECT elements found`);
    }
    if (document.attributeDefinitions.length === 0) {
        warnings.add('structure', `${source}: no attribute definitions found, value types are taken from the values`);
    }
    if (document.hierarchy.length === 0) {
        warnings.add('structure', `${source}: no SPEC-HIERARCHY found, requirements are imported flat`);
    }
    return document;
}

export function mergeDocuments(documents: readonly RawReqifDocument[]): RawReqifDocument {
    return {
        sources: documents.flatMap(d => d.sources),
        datatypes: documents.flatMap(d => d.datatypes),
        attributeDefinitions: documents.flatMap(d => d.attributeDefinitions),
        specObjects: documents.flatMap(d => d.specObjects),
        relations: documents.flatMap(d => d.relations),
        hierarchy: documents.flatMap(d => d.hierarchy),
    };
}

function isReqifEntry(name: string): boolean {
    return name.toLowerCase().endsWith('.reqif');
}

async function readSourceFile(filePath: string, warnings: WarningCollector): Promise<RawReqifDocument[]> {
    let buffer: Buffer;
    try {
        buffer = await fs.promises.readFile(filePath);
    } catch (error) {
        throw new ReqifFatalError(`Unable to read ReqIF source ${filePath}: ${errorMessage(error)}`);
    }

    const container = isZipArchive(buffer) || filePath.toLowerCase().endsWith('.reqifz');
    if (!container) {
        const document = parseReqifDocument(buffer.toString('utf-8'), filePath, warnings);
        return document ? [document] : [];
    }

    let contents: ArchiveContents;
    try {
        contents = await readArchive(buffer, isReqifEntry);
    } catch (error) {
        throw new ReqifFatalError(`Unable to unpack ReqIFZ container ${filePath}: ${errorMessage(error)}`);
    }
    if (contents.entries.length === 0) {
        throw new ReqifFatalError(`ReqIFZ container ${filePath} holds no .reqif entry`);
    }
    if (contents.skipped.length > 0) {
        warnings.add('structure', `${filePath}: ignored ${contents.skipped.length} attachment(s) in container`);
    }

    const documents: RawReqifDocument[] = [];
    for (const entry of contents.entries) {
        const document = parseReqifDocument(entry.content.toString('utf-8'), `${filePath}:${entry.name}`, warnings);
        if (document) documents.push(document);
    }
    return documents;
}

/** A file path is returned as-is; a directory is searched recursively for ReqIF files. */
export async function resolveReqifSources(sourcePath: string): Promise<string[]> {
    let stat: fs.Stats;
    try {
        stat = await fs.promises.stat(sourcePath);
    } catch (error) {
        throw new ReqifFatalError(`ReqIF source not found at ${sourcePath}: ${errorMessage(error)}`);
    }
    if (!stat.isDirectory()) {
        return [sourcePath];
    }

    const found: string[] = [];
    const walk = async (dir: string) => {
        const entries = await fs.promises.readdir(dir, { withFileTypes: true });
        entries.sort((a, b) => a.name.localeCompare(b.name));
        for (const entry of entries) {
            const full = path.join(dir, entry.name);
            if (entry.isDirectory()) {
                if (entry.name !== 'node_modules' && !entry.name.startsWith('.')) await walk(full);
            } else if (REQIF_EXTENSIONS.includes(path.extname(entry.name).toLowerCase())) {
                found.push(full);
            }
        }
    };
    await walk(sourcePath);

    if (found.length === 0) {
        throw new ReqifFatalError(`No .reqif or .reqifz files found under ${sourcePath}`);
    }
    return found;
}

/**
 * Reads every ReqIF document behind `sourcePath` (file, ReqIFZ container or directory)
 * and merges them as if they were one document.
 */
export async function readReqifSource(sourcePath: string, warnings: WarningCollector): Promise<RawReqifDocument> {
    const files = await resolveReqifSources(sourcePath);
    const documents: RawReqifDocument[] = [];
    for (const file of files) {
        documents.push(...await readSourceFile(file, warnings));
    }
    if (documents.length === 0) {
        throw new ReqifFatalError(`No recognizable ReqIF document in ${sourcePath}`);
    }
    return mergeDocuments(documents);
}
