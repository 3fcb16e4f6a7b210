import { RawReqifDocument, RawSpecObject, RawValue } from './reader';
import { AttributeDefinition, AttributeKind, AttributeValue } from './types';
import { WarningCollector } from './warnings';
import { normalizeXhtml, normalizeXhtmlNodes } from './xhtml';

// Candidate attribute names, tried in order (case-insensitive)
export const IDENTIFIER_ATTRIBUTES = ['REQ-ID', 'ReqIF.ForeignID', 'ID', 'Identifier', 'Object Identifier'];
export const TITLE_ATTRIBUTES = ['REQ-TITLE', 'ReqIF.Name', 'Title', 'Name', 'Object Heading', 'ReqIF.ChapterName'];
export const DESCRIPTION_ATTRIBUTES = ['REQ-DESC', 'ReqIF.Text', 'Description', 'Object Text', 'Text'];

export interface BuiltRequirement {
    identifier: string;
    objectIdentifiers: string[];
    title: string;
    description: string;
    attributes: Map<string, AttributeValue>;
    derivedFrom: { identifier?: string; title?: string; description?: string };
    revision?: string;
}

export interface BuildResult {
    requirements: Map<string, BuiltRequirement>; // in order of first appearance
    objectIndex: Map<string, string>; // SPEC-OBJECT identifier -> requirement identifier
    attributeNames: string[];
}

// One spec object with its values resolved, before duplicates are merged
export interface ObjectRecord {
    objectIdentifiers: string[];
    name?: string;
    revision?: string;
    attributes: Map<string, AttributeValue>;
}

interface DefinitionTables {
    byIdentifier: Map<string, AttributeDefinition>;
    byName: Map<string, AttributeDefinition>; // upper-cased name
}

export function isEmptyValue(value: AttributeValue): boolean {
    switch (value.kind) {
        case 'integer':
        case 'real':
        case 'boolean':
            return false;
        case 'enumeration':
            return value.labels.length === 0;
        default:
            return value.value.trim() === '';
    }
}

export function formatValue(value: AttributeValue): string {
    switch (value.kind) {
        case 'enumeration':
            return value.labels.join(', ');
        case 'integer':
        case 'real':
        case 'boolean':
            return String(value.value);
        default:
            return value.value;
    }
}

export function parseInteger(text: string): number | undefined {
    let cleaned = text.trim().replace(/[\s_]/g, '');
    // A comma only separates thousands; "1,5" is a decimal and not an integer
    if (/^[+-]?\d{1,3}(,\d{3})+$/.test(cleaned)) {
        cleaned = cleaned.replace(/,/g, '');
    }
    if (!/^[+-]?\d+$/.test(cleaned)) return undefined;
    const value = Number(cleaned);
    return Number.isSafeInteger(value) ? value : undefined;
}

export function parseReal(text: string): number | undefined {
    let cleaned = text.trim().replace(/[\s_]/g, '');
    if (cleaned.includes(',') && !cleaned.includes('.')) {
        cleaned = cleaned.replace(',', '.');
    }
    if (!/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(cleaned)) return undefined;
    return Number(cleaned);
}

export function parseBoolean(text: string): boolean | undefined {
    switch (text.trim().toLowerCase()) {
        case 'true':
        case '1':
        case 'yes':
            return true;
        case 'false':
        case '0':
        case 'no':
            return false;
        default:
            return undefined;
    }
}

function validDay(isoDate: string): boolean {
    const date = new Date(`${isoDate}T00:00:00Z`);
    return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === isoDate;
}

/** ISO date (kept as YYYY-MM-DD), ISO date-time (normalized to UTC) or dd.mm.yyyy. */
export function parseDate(text: string): string | undefined {
    const trimmed = text.trim();
    if (/^\d{4}-\d{2}-\d{2}$/.test(trimmed)) {
        return validDay(trimmed) ? trimmed : undefined;
    }
    if (/^\d{4}-\d{2}-\d{2}T/.test(trimmed)) {
        const time = Date.parse(trimmed);
        return Number.isNaN(time) ? undefined : new Date(time).toISOString();
    }
    const dotted = trimmed.match(/^(\d{1,2})\.(\d{1,2})\.(\d{4})$/);
    if (dotted) {
        const isoDate = `${dotted[3]}-${dotted[2].padStart(2, '0')}-${dotted[1].padStart(2, '0')}`;
        return validDay(isoDate) ? isoDate : undefined;
    }
    return undefined;
}

function buildDefinitionTables(document: RawReqifDocument): DefinitionTables {
    const datatypes = new Map(document.datatypes.map(d => [d.identifier, d]));
    const tables: DefinitionTables = { byIdentifier: new Map(), byName: new Map() };

    for (const raw of document.attributeDefinitions) {
        if (tables.byIdentifier.has(raw.identifier)) continue;
        const datatype = raw.datatypeRef ? datatypes.get(raw.datatypeRef) : undefined;
        const definition: AttributeDefinition = {
            identifier: raw.identifier,
            name: raw.name,
            kind: raw.kind,
            datatypeRef: raw.datatypeRef,
            enumValues: raw.kind === 'enumeration' && datatype ? datatype.enumValues : [],
        };
        tables.byIdentifier.set(definition.identifier, definition);
        const nameKey = definition.name.toUpperCase();
        if (!tables.byName.has(nameKey)) tables.byName.set(nameKey, definition);
    }
    return tables;
}

function resolveEnumeration(definition: AttributeDefinition, raw: RawValue, warnings: WarningCollector, subject: string): AttributeValue {
    const labels: string[] = [];
    const unresolved: string[] = [];
    const tokens = raw.enumRefs.length > 0 ? raw.enumRefs : raw.text.trim() === '' ? [] : [raw.text.trim()];

    for (const token of tokens) {
        const byReference = definition.enumValues.find(v => v.identifier === token);
        const byLabel = byReference ?? definition.enumValues.find(v => v.label.toLowerCase() === token.toLowerCase());
        if (byLabel) {
            labels.push(byLabel.label);
        } else {
            labels.push(token);
            unresolved.push(token);
            warnings.add('enumeration', `Value '${token}' of '${definition.name}' matches no enumeration entry, kept as text`, subject);
        }
    }
    return { kind: 'enumeration', labels, unresolved };
}

export function resolveValue(definition: AttributeDefinition, raw: RawValue, warnings: WarningCollector, subject: string): AttributeValue {
    const text = raw.text.trim();
    const fallback = (expected: AttributeKind): AttributeValue => {
        if (text !== '') {
            warnings.add('parse', `Value '${text}' of '${definition.name}' is not a valid ${expected}, kept as text`, subject);
        }
        return { kind: 'raw', expected, value: text };
    };

    switch (definition.kind) {
        case 'integer': {
            const value = parseInteger(text);
            return value === undefined ? fallback('integer') : { kind: 'integer', value };
        }
        case 'real': {
            const value = parseReal(text);
            return value === undefined ? fallback('real') : { kind: 'real', value };
        }
        case 'boolean': {
            const value = parseBoolean(text);
            return value === undefined ? fallback('boolean') : { kind: 'boolean', value };
        }
        case 'date': {
            const value = parseDate(text);
            return value === undefined ? fallback('date') : { kind: 'date', value };
        }
        case 'enumeration':
            return resolveEnumeration(definition, raw, warnings, subject);
        case 'xhtml':
            return { kind: 'xhtml', value: raw.nodes ? normalizeXhtmlNodes(raw.nodes) : normalizeXhtml(raw.text) };
        case 'text':
            return { kind: 'text', value: raw.nodes ? normalizeXhtmlNodes(raw.nodes) : text };
    }
}

function lookupDefinition(tables: DefinitionTables, raw: RawValue, warnings: WarningCollector, subject: string): AttributeDefinition {
    if (raw.definitionRef) {
        const found = tables.byIdentifier.get(raw.definitionRef) ?? tables.byName.get(raw.definitionRef.toUpperCase());
        if (found) return found;
    }
    const name = raw.definitionRef ?? `Unnamed ${raw.kind ?? 'text'} value`;
    warnings.add('structure', `Attribute definition '${name}' not found, using the value as ${raw.kind ?? 'text'}`, subject);
    return { identifier: name, name, kind: raw.kind ?? 'text', enumValues: [] };
}

function resolveObject(object: RawSpecObject, tables: DefinitionTables, warnings: WarningCollector): ObjectRecord {
    const attributes = new Map<string, AttributeValue>();
    for (const raw of object.values) {
        const definition = lookupDefinition(tables, raw, warnings, object.identifier);
        const value = resolveValue(definition, raw, warnings, object.identifier);
        const existing = attributes.get(definition.name);
        if (!existing || (isEmptyValue(existing) && !isEmptyValue(value))) {
            attributes.set(definition.name, value);
        }
    }
    return { objectIdentifiers: [object.identifier], name: object.name, revision: object.revision, attributes };
}

function completeness(record: ObjectRecord): number {
    let count = record.name ? 1 : 0;
    for (const value of record.attributes.values()) {
        if (!isEmptyValue(value)) count++;
    }
    return count;
}

/**
 * Merges two spec objects that carry the same requirement identifier. The more
 * complete record is the base (the first one on a tie); its empty fields are
 * filled from the other. Two different non-empty values keep the base value.
 */
export function mergeRecords(first: ObjectRecord, second: ObjectRecord, warnings: WarningCollector, subject: string): ObjectRecord {
    const [base, other] = completeness(second) > completeness(first) ? [second, first] : [first, second];
    const attributes = new Map<string, AttributeValue>();
    const names = [...new Set([...first.attributes.keys(), ...second.attributes.keys()])];

    for (const name of names) {
        const baseValue = base.attributes.get(name);
        const otherValue = other.attributes.get(name);
        if (baseValue && !isEmptyValue(baseValue)) {
            if (otherValue && !isEmptyValue(otherValue) && formatValue(otherValue) !== formatValue(baseValue)) {
                warnings.add('duplicate', `Conflicting values for '${name}': kept '${formatValue(baseValue)}', dropped '${formatValue(otherValue)}'`, subject);
            }
            attributes.set(name, baseValue);
        } else if (otherValue && !isEmptyValue(otherValue)) {
            attributes.set(name, otherValue);
        } else {
            const value = baseValue ?? otherValue;
            if (value) attributes.set(name, value);
        }
    }

    return {
        objectIdentifiers: [...first.objectIdentifiers, ...second.objectIdentifiers],
        name: base.name ?? other.name,
        revision: base.revision ?? other.revision,
        attributes,
    };
}

function pickAttribute(attributes: Map<string, AttributeValue>, candidates: readonly string[]): { name: string; text: string } | undefined {
    for (const candidate of candidates) {
        for (const [name, value] of attributes) {
            if (name.toUpperCase() !== candidate.toUpperCase()) continue;
            const text = formatValue(value).trim();
            if (text !== '') return { name, text };
        }
    }
    return undefined;
}

function requirementIdentifier(record: ObjectRecord): { identifier: string; from?: string } {
    const picked = pickAttribute(record.attributes, IDENTIFIER_ATTRIBUTES);
    return picked ? { identifier: picked.text, from: picked.name } : { identifier: record.objectIdentifiers[0] };
}

function toRequirement(identifier: string, identifierFrom: string | undefined, record: ObjectRecord): BuiltRequirement {
    const title = pickAttribute(record.attributes, TITLE_ATTRIBUTES);
    const description = pickAttribute(record.attributes, DESCRIPTION_ATTRIBUTES);
    return {
        identifier,
        objectIdentifiers: record.objectIdentifiers,
        title: title?.text ?? record.name ?? identifier,
        description: description?.text ?? '',
        attributes: record.attributes,
        derivedFrom: { identifier: identifierFrom, title: title?.name, description: description?.name },
        revision: record.revision,
    };
}

/**
 * Resolves every spec object against the attribute definition and enumeration
 * tables and folds objects sharing a requirement identifier into one record.
 */
export function buildRequirements(document: RawReqifDocument, warnings: WarningCollector): BuildResult {
    const tables = buildDefinitionTables(document);
    const records = new Map<string, { record: ObjectRecord; from?: string }>();
    const attributeNames = new Set<string>();

    for (const object of document.specObjects) {
        const record = resolveObject(object, tables, warnings);
        record.attributes.forEach((_, name) => attributeNames.add(name));
        const { identifier, from } = requirementIdentifier(record);

        const existing = records.get(identifier);
        if (existing) {
            warnings.add('duplicate', `Spec objects ${existing.record.objectIdentifiers.join(', ')} and ${object.identifier} share this identifier, merged`, identifier);
            records.set(identifier, { record: mergeRecords(existing.record, record, warnings, identifier), from: existing.from ?? from });
        } else {
            records.set(identifier, { record, from });
        }
    }

    const requirements = new Map<string, BuiltRequirement>();
    const objectIndex = new Map<string, string>();
    for (const [identifier, { record, from }] of records) {
        requirements.set(identifier, toRequirement(identifier, from, record));
        for (const objectIdentifier of record.objectIdentifiers) {
            if (!objectIndex.has(objectIdentifier)) objectIndex.set(objectIdentifier, identifier);
        }
    }

    return { requirements, objectIndex, attributeNames: [...attributeNames] };
}
