import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { formatValue, isEmptyValue } from './builder';
import { renderBody, renderTitle } from './render';
import { RenderedIssue, RequirementSet } from './types';
import { WarningCollector } from './warnings';

export interface FieldMapping {
    includeInBody: boolean;
    trackerField?: string;
}

// Attribute name -> mapping, in file order
export type FieldMap = Map<string, FieldMapping>;

export type SyncMode = 'live' | 'dry-run';

export interface MappingOptions {
    fieldMap?: FieldMap; // absent on the first run
    mode: SyncMode;
    trackerFields?: readonly string[]; // undefined when the tracker's fields are not known
}

export interface FieldMismatch {
    attribute: string;
    trackerField: string;
    suggestion?: string; // tracker field differing only in case
}

export interface MappingResult {
    fieldMap: FieldMap;
    generated: boolean;
    writesEnabled: boolean;
    rendered: Map<string, RenderedIssue>;
    mismatches: FieldMismatch[];
    unmapped: string[]; // discovered attributes missing from the field map
}

const COLUMNS = ['attribute', 'include_in_body', 'tracker_field'];

export function loadFieldMap(filePath: string): FieldMap | undefined {
    if (!fs.existsSync(filePath)) {
        return undefined;
    }

    const content = fs.readFileSync(filePath, 'utf-8');
    const records = parse(content, {
        columns: true,
        skip_empty_lines: true,
        trim: true,
    }) as Record<string, string | undefined>[];

    const fieldMap: FieldMap = new Map();
    for (const record of records) {
        const attribute = record['attribute'];
        if (!attribute) continue;
        const trackerField = record['tracker_field'];
        fieldMap.set(attribute, {
            includeInBody: (record['include_in_body'] ?? '').toLowerCase() === 'true',
            trackerField: trackerField ? trackerField : undefined,
        });
    }
    return fieldMap;
}

export function saveFieldMap(filePath: string, fieldMap: FieldMap): void {
    const rows = [...fieldMap].map(([attribute, mapping]) => [
        attribute,
        mapping.includeInBody ? 'true' : 'false',
        mapping.trackerField ?? '',
    ]);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, stringify(rows, { header: true, columns: COLUMNS }));
}

/** Default map for a first run: every attribute in the body, nothing pushed to tracker fields. */
export function bootstrapFieldMap(attributeNames: readonly string[]): FieldMap {
    return new Map(attributeNames.map(name => [name, { includeInBody: true }]));
}

/**
 * Renders every requirement with the field map. Without a field map one is
 * bootstrapped from the discovered attributes and the run becomes a dry run.
 */
export function mapRequirements(set: RequirementSet, options: MappingOptions, warnings: WarningCollector): MappingResult {
    const generated = options.fieldMap === undefined;
    const fieldMap = options.fieldMap ?? bootstrapFieldMap(set.attributeNames);
    const writesEnabled = !generated && options.mode === 'live';

    const unmapped = set.attributeNames.filter(name => !fieldMap.has(name));
    for (const name of unmapped) {
        warnings.add('mapping', `Attribute '${name}' is not in the field map and is left out of issues`);
    }

    const mismatches: FieldMismatch[] = [];
    const trackerMappings: { attribute: string; field: string }[] = [];
    for (const [attribute, mapping] of fieldMap) {
        if (!mapping.trackerField) continue;
        const known = options.trackerFields;
        if (known && !known.includes(mapping.trackerField)) {
            const suggestion = known.find(f => f.toLowerCase() === mapping.trackerField?.toLowerCase());
            mismatches.push({ attribute, trackerField: mapping.trackerField, suggestion });
            const hint = suggestion ? ` (did you mean '${suggestion}'?)` : '';
            warnings.add('mapping', `Tracker field '${mapping.trackerField}' mapped from '${attribute}' does not exist${hint}`);
            continue;
        }
        trackerMappings.push({ attribute, field: mapping.trackerField });
    }

    const bodyAttributes = [...fieldMap].filter(([, mapping]) => mapping.includeInBody).map(([name]) => name);
    const rendered = new Map<string, RenderedIssue>();
    for (const [identifier, requirement] of set.requirements) {
        const fields: Record<string, string> = {};
        for (const { attribute, field } of trackerMappings) {
            const value = requirement.attributes.get(attribute);
            if (value && !isEmptyValue(value)) fields[field] = formatValue(value);
        }
        rendered.set(identifier, {
            title: renderTitle(requirement),
            body: renderBody(requirement, bodyAttributes),
            fields,
        });
    }

    return { fieldMap, generated, writesEnabled, rendered, mismatches, unmapped };
}
