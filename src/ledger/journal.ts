import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { PipelineState, StageResult } from './types.js';

export interface StateJournal {
  record(keyId: string, result: StageResult, state: PipelineState): Promise<void>;
}

export class FileStateJournal implements StateJournal {
  constructor(private readonly dir: string) {}

  pathFor(keyId: string, result: StageResult): string {
    const prefix = String(result.ordinal).padStart(2, '0');
    return join(this.dir, keyId, `${prefix}_${result.stage}.json`);
  }

  async record(keyId: string, result: StageResult, state: PipelineState): Promise<void> {
    await mkdir(join(this.dir, keyId), { recursive: true });
    await writeFile(this.pathFor(keyId, result), JSON.stringify(state, null, 2));
  }
}
