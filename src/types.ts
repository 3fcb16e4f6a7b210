export type AttributeKind = 'text' | 'integer' | 'real' | 'boolean' | 'date' | 'enumeration' | 'xhtml';

export interface EnumValue {
    identifier: string;
    label: string;
}

export interface AttributeDefinition {
    identifier: string;
    name: string;
    kind: AttributeKind;
    datatypeRef?: string;
    enumValues: readonly EnumValue[]; // empty unless kind is 'enumeration'
}

export type AttributeValue =
    | { kind: 'text'; value: string }
    | { kind: 'xhtml'; value: string }
    | { kind: 'integer'; value: number }
    | { kind: 'real'; value: number }
    | { kind: 'boolean'; value: boolean }
    | { kind: 'date'; value: string }
    | { kind: 'enumeration'; labels: string[]; unresolved: string[] }
    // Value that did not parse to its declared kind; the source text is kept as-is
    | { kind: 'raw'; expected: AttributeKind; value: string };

export interface Requirement {
    identifier: string;
    objectIdentifiers: string[]; // SPEC-OBJECT identifiers merged into this requirement
    title: string;
    description: string;
    attributes: Map<string, AttributeValue>;
    // Attribute names the identifier, title and description were taken from
    derivedFrom: { identifier?: string; title?: string; description?: string };
    parent?: string;
    children: string[];
    related: string[];
    revision?: string; // LAST-CHANGE marker
}

export interface RequirementSet {
    requirements: Map<string, Requirement>;
    roots: string[]; // top-level requirements in document order
    attributeNames: string[];
}

export interface IssueRef {
    number: number;
    url: string;
}

// An issue found on the tracker that already carries a requirement identifier
export interface ExistingIssue {
    issue: IssueRef;
    closed: boolean;
}

export interface SyncStateEntry {
    contentHash: string;
    issue?: IssueRef;
    projectFields: Record<string, string>;
    parent?: string; // parent the issue is linked under on the tracker
    revision?: string;
    closed: boolean;
}

export type SyncStateMap = Map<string, SyncStateEntry>;

export interface RenderedIssue {
    title: string;
    body: string;
    fields: Record<string, string>; // tracker field name -> value
}

export interface CreateOperation {
    type: 'create';
    identifier: string;
    title: string;
    body: string;
    fields: Record<string, string>;
    parent?: string;
    next: SyncStateEntry;
}

export interface UpdateOperation {
    type: 'update';
    identifier: string;
    issue: IssueRef;
    title: string;
    body: string;
    fields: Record<string, string>;
    previousFields: Record<string, string>;
    parent?: string;
    previousParent?: string;
    reopen: boolean;
    next: SyncStateEntry;
}

export interface CloseOperation {
    type: 'close';
    identifier: string;
    issue: IssueRef;
    next: SyncStateEntry;
}

export interface NoopOperation {
    type: 'noop';
    identifier: string;
    next: SyncStateEntry;
}

export type SyncOperation = CreateOperation | UpdateOperation | CloseOperation | NoopOperation;
