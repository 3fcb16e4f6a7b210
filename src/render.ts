import { formatValue, isEmptyValue } from './builder';
import { Requirement } from './types';

export const IMPORT_FOOTER = '_Imported from ReqIF_';

const MAX_TITLE_LENGTH = 256;

export function renderTitle(requirement: Requirement): string {
    const title = requirement.title === requirement.identifier
        ? requirement.identifier
        : `${requirement.identifier}: ${requirement.title}`;
    return title.length > MAX_TITLE_LENGTH ? `${title.slice(0, MAX_TITLE_LENGTH - 1)}…` : title;
}

/**
 * Issue body: identifier line, description, then one bullet per body attribute and
 * the hierarchy / relation links, by requirement identifier.
 */
export function renderBody(requirement: Requirement, bodyAttributes: readonly string[]): string {
    let content = `**Requirement ID:** ${requirement.identifier}\n\n`;

    if (requirement.description) {
        content += `${requirement.description}\n\n`;
    }

    const consumed = new Set(Object.values(requirement.derivedFrom));
    const lines: string[] = [];
    for (const name of bodyAttributes) {
        if (consumed.has(name)) continue;
        const value = requirement.attributes.get(name);
        if (!value || isEmptyValue(value)) continue;
        lines.push(`- **${name}:** ${formatValue(value).replace(/\n/g, ' ')}`);
    }
    if (requirement.parent) {
        lines.push(`- **Parent:** ${requirement.parent}`);
    }
    if (requirement.related.length > 0) {
        lines.push(`- **Related:** ${requirement.related.join(', ')}`);
    }
    if (lines.length > 0) {
        content += `${lines.join('\n')}\n\n`;
    }

    content += IMPORT_FOOTER;
    return content;
}
