// src/services/tempFile.ts
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';

const TEMP_PREFIX = 'doc-lineage-';

/**
 * Writes `data` to a fresh temporary file, hands its path to `work`, and removes
 * the file and its directory once `work` settles, whether it resolved or threw.
 */
export async function withTempFile<T>(
    data: Buffer,
    filename: string,
    work: (filePath: string) => Promise<T>,
): Promise<T> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), TEMP_PREFIX));
    try {
        const filePath = path.join(dir, path.basename(filename));
        await fs.writeFile(filePath, data);
        return await work(filePath);
    } finally {
        await fs.rm(dir, { recursive: true, force: true });
    }
}
