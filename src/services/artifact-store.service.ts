// src/services/artifact-store.service.ts

import { promises as fs } from 'fs';
import path from 'path';
import { BaseService } from './base/BaseService';
import type { ServiceConfig } from './base/types';
import type { ArtifactRecord, BackendId } from '../models/conversion.model';

interface ArtifactStoreConfig extends ServiceConfig {
    baseDir: string;
}

export const artifactFileName = (backend: BackendId): string => `optimized_${backend}.cpp`;

/** One file per backend under a fixed directory. Writes overwrite; there is no history. */
export class ArtifactStore extends BaseService {
    readonly baseDir: string;

    constructor(config: ArtifactStoreConfig) {
        super(config);
        this.baseDir = path.resolve(config.baseDir);
    }

    pathFor(backend: BackendId): string {
        return path.join(this.baseDir, artifactFileName(backend));
    }

    async ensureBaseDir(): Promise<void> {
        await fs.mkdir(this.baseDir, { recursive: true });
    }

    async write(code: string, backend: BackendId): Promise<ArtifactRecord> {
        await this.ensureBaseDir();
        const filePath = this.pathFor(backend);
        await fs.writeFile(filePath, code, 'utf-8');
        this.logger.info('Artifact written', { backend, path: filePath, bytes: Buffer.byteLength(code) });
        return { backend, path: filePath, code };
    }

    async read(backend: BackendId): Promise<ArtifactRecord | null> {
        const filePath = this.pathFor(backend);
        try {
            const code = await fs.readFile(filePath, 'utf-8');
            return { backend, path: filePath, code };
        } catch (error) {
            if (isNodeError(error) && error.code === 'ENOENT') {
                return null;
            }
            throw error;
        }
    }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}
