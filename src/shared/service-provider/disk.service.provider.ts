import { statfs } from "fs/promises";

export type FsBlocks = {
    blocks: number;
    bfree: number;
    bavail: number;
};

export interface DiskUsageReader {
    usagePercent(path: string): Promise<number>;
}

/**
 * Use% as df prints it: blocks reserved for root count as neither used nor
 * available, and the ratio is rounded up.
 */
export function usagePercent({ blocks, bfree, bavail }: FsBlocks): number {
    const used = blocks - bfree;
    const total = used + bavail;
    if (total <= 0) return 0;
    return Math.ceil((used * 100) / total);
}

export class DiskServiceProvider implements DiskUsageReader {
    async usagePercent(path: string): Promise<number> {
        return usagePercent(await statfs(path));
    }
}
