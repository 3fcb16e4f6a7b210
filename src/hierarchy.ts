import { BuildResult } from './builder';
import { RawHierarchyNode, RawRelation } from './reader';
import { Requirement, RequirementSet } from './types';
import { WarningCollector } from './warnings';

function resolveReference(built: BuildResult, ref: string | undefined): string | undefined {
    if (!ref) return undefined;
    // Hierarchy and relations point at SPEC-OBJECT identifiers; some exports use the requirement ID instead
    return built.objectIndex.get(ref) ?? (built.requirements.has(ref) ? ref : undefined);
}

function link(requirements: Map<string, Requirement>, from: string, to: string): void {
    const source = requirements.get(from);
    if (source && !source.related.includes(to)) source.related.push(to);
}

/**
 * Attaches parent/child links from the spec hierarchy and related links from the
 * spec relations. A requirement keeps the parent of its first hierarchy position.
 */
export function resolveHierarchy(
    hierarchy: readonly RawHierarchyNode[],
    relations: readonly RawRelation[],
    built: BuildResult,
    warnings: WarningCollector,
): RequirementSet {
    const requirements = new Map<string, Requirement>();
    for (const [identifier, requirement] of built.requirements) {
        requirements.set(identifier, { ...requirement, children: [], related: [] });
    }

    const placed = new Set<string>();
    const roots: string[] = [];

    const walk = (node: RawHierarchyNode, parent: string | undefined) => {
        const identifier = resolveReference(built, node.objectRef);

        if (node.objectRef && !identifier) {
            warnings.add('hierarchy', `Hierarchy references unknown spec object '${node.objectRef}', attaching its children to the enclosing requirement`);
        }

        if (!identifier || identifier === parent) {
            node.children.forEach(child => walk(child, parent));
            return;
        }

        if (placed.has(identifier)) {
            const kept = requirements.get(identifier)?.parent;
            warnings.add('hierarchy', `Requirement appears at several hierarchy positions, keeping parent ${kept ?? '(top level)'}`, identifier);
        } else {
            placed.add(identifier);
            const requirement = requirements.get(identifier);
            const parentRequirement = parent ? requirements.get(parent) : undefined;
            if (requirement && parentRequirement) {
                requirement.parent = parentRequirement.identifier;
                parentRequirement.children.push(identifier);
            } else {
                roots.push(identifier);
            }
        }
        node.children.forEach(child => walk(child, identifier));
    };
    hierarchy.forEach(node => walk(node, undefined));

    for (const identifier of requirements.keys()) {
        if (!placed.has(identifier)) roots.push(identifier);
    }

    for (const relation of relations) {
        const source = resolveReference(built, relation.source);
        const target = resolveReference(built, relation.target);
        const label = relation.identifier ?? `${relation.source ?? '?'} -> ${relation.target ?? '?'}`;
        if (!source || !target) {
            const missing = !source ? relation.source ?? '(none)' : relation.target ?? '(none)';
            warnings.add('relation', `Relation ${label} references unknown spec object '${missing}', dropped`);
            continue;
        }
        if (source === target) continue;
        link(requirements, source, target);
        link(requirements, target, source);
    }

    return { requirements, roots, attributeNames: built.attributeNames };
}
