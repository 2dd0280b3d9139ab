export interface DavQuotaJSON {
    resourceUrl?: string;
    availableBytes?: number;
    usedBytes?: number;
    totalBytes?: number;
}

const UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

function formatBytes(bytes: number): string {
    let value = bytes;
    let unit = 0;
    while (value >= 1024 && unit < UNITS.length - 1) {
        value /= 1024;
        unit++;
    }
    return unit === 0 ? `${bytes} B` : `${value.toFixed(1)} ${UNITS[unit]}`;
}

export class DavQuota {
    readonly resourceUrl?: string;
    readonly availableBytes?: number;
    readonly usedBytes?: number;
    private readonly explicitTotal?: number;

    constructor(init: DavQuotaJSON) {
        this.resourceUrl = init.resourceUrl;
        this.availableBytes = init.availableBytes;
        this.usedBytes = init.usedBytes;
        this.explicitTotal = init.totalBytes;
    }

    get totalBytes(): number | undefined {
        if (this.explicitTotal !== undefined) return this.explicitTotal;
        if (this.usedBytes !== undefined && this.availableBytes !== undefined) {
            return this.usedBytes + this.availableBytes;
        }
        return undefined;
    }

    /** Fraction between 0 and 1, undefined without a known total. */
    get usagePercentage(): number | undefined {
        const total = this.totalBytes;
        if (total === undefined || total === 0 || this.usedBytes === undefined) return undefined;
        return this.usedBytes / total;
    }

    get hasQuotaInfo(): boolean {
        return this.availableBytes !== undefined || this.usedBytes !== undefined || this.explicitTotal !== undefined;
    }

    get isFull(): boolean {
        const usage = this.usagePercentage;
        return this.availableBytes === 0 || (usage !== undefined && usage >= 1);
    }

    get description(): string {
        if (!this.hasQuotaInfo) return 'No quota information available';
        const used = this.usedBytes;
        const total = this.totalBytes;
        if (used !== undefined && total !== undefined) {
            return `${formatBytes(used)} of ${formatBytes(total)} used`;
        }
        if (used !== undefined) return `${formatBytes(used)} used`;
        if (this.availableBytes !== undefined) return `${formatBytes(this.availableBytes)} available`;
        return 'Quota information incomplete';
    }

    toJSON(): DavQuotaJSON {
        return {
            resourceUrl: this.resourceUrl,
            availableBytes: this.availableBytes,
            usedBytes: this.usedBytes,
            totalBytes: this.explicitTotal,
        };
    }

    static fromJSON(json: DavQuotaJSON): DavQuota {
        return new DavQuota(json);
    }
}
