// src/services/program-catalog.service.ts

import { promises as fs } from 'fs';
import path from 'path';
import { BaseService } from './base/BaseService';
import type { ServiceConfig } from './base/types';

export interface ProgramEntry {
    id: string;
    title: string;
    source: string;
}

interface ProgramCatalogConfig extends ServiceConfig {
    programsDir: string;
}

const PROGRAM_TITLES: Record<string, string> = {
    pi: 'Pi Calculation - numerical series approximation',
    hard: 'Maximum Subarray Sum - LCG-generated input, quadratic scan',
};

export const FALLBACK_PROGRAM: ProgramEntry = {
    id: 'fibonacci',
    title: 'Fibonacci Example',
    source: `function fibonacci(n) {
  if (n <= 1) return n;
  return fibonacci(n - 1) + fibonacci(n - 2);
}

for (let i = 0; i < 10; i++) {
  console.log(\`fibonacci(\${i}) = \${fibonacci(i)}\`);
}`,
};

export const titleFromId = (id: string): string =>
    id
        .split(/[_-]+/)
        .filter(Boolean)
        .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
        .join(' ');

/** Example programs shipped alongside the harness, one .js file each. */
export class ProgramCatalogService extends BaseService {
    private readonly programsDir: string;

    constructor(config: ProgramCatalogConfig) {
        super(config);
        this.programsDir = config.programsDir;
    }

    async list(): Promise<ProgramEntry[]> {
        let fileNames: string[];
        try {
            fileNames = await fs.readdir(this.programsDir);
        } catch (error: unknown) {
            this.logFailure('warn', 'Programs directory unavailable', error, { dir: this.programsDir });
            return [FALLBACK_PROGRAM];
        }

        const programs: ProgramEntry[] = [];
        for (const fileName of fileNames.filter((name) => name.endsWith('.js')).sort()) {
            const id = fileName.slice(0, -'.js'.length);
            try {
                const source = await fs.readFile(path.join(this.programsDir, fileName), 'utf-8');
                programs.push({ id, title: PROGRAM_TITLES[id] ?? titleFromId(id), source });
            } catch (error: unknown) {
                this.logFailure('error', 'Failed to load program', error, { fileName });
            }
        }

        return programs.length > 0 ? programs : [FALLBACK_PROGRAM];
    }
}
