export type WarningCategory =
    | 'structure'
    | 'duplicate'
    | 'enumeration'
    | 'parse'
    | 'hierarchy'
    | 'relation'
    | 'mapping';

export interface SyncWarning {
    category: WarningCategory;
    message: string;
    subject?: string; // requirement or spec-object identifier the warning is about
}

/**
 * Collects recoverable problems found while reading and mapping the input.
 * Nothing here aborts a run; the Action reports the collected items at the end.
 */
export class WarningCollector {
    private readonly entries: SyncWarning[] = [];

    public add(category: WarningCategory, message: string, subject?: string): void {
        this.entries.push({ category, message, subject });
    }

    public get items(): readonly SyncWarning[] {
        return this.entries;
    }

    public byCategory(category: WarningCategory): SyncWarning[] {
        return this.entries.filter(w => w.category === category);
    }

    public get size(): number {
        return this.entries.length;
    }
}

export function formatWarning(warning: SyncWarning): string {
    const subject = warning.subject ? ` [${warning.subject}]` : '';
    return `(${warning.category})${subject} ${warning.message}`;
}
