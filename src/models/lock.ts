export type LockScope = 'exclusive' | 'shared';

export interface Activelock {
    readonly token?: string;
    readonly scope: LockScope;
    readonly type: string;
    readonly depth: number;
    readonly owner?: string;
    /** Seconds, -1 for "Infinite", undefined when absent. */
    readonly timeout?: number;
    readonly lockRoot?: string;
}

export interface LockOptions {
    scope?: LockScope;
    depth?: number;
    owner?: string;
}
