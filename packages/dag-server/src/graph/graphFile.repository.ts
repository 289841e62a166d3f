import { Inject, Injectable } from '@nestjs/common';
import { promises as fs } from 'node:fs';
import path from 'node:path';

import { ConfigService } from '../core/services/config.service';
import { LoggerService } from '../core/services/logger.service';
import type { GraphDocument } from '../shared/types/graph.types';
import { InvalidInputError } from './errors';

const isErrnoException = (err: unknown): err is NodeJS.ErrnoException => err instanceof Error && 'code' in err;

/** Graph document persisted as a single JSON file. */
@Injectable()
export class GraphFileRepository {
  constructor(
    @Inject(ConfigService) private readonly config: ConfigService,
    @Inject(LoggerService) private readonly logger: LoggerService,
  ) {}

  get filePath(): string {
    return path.resolve(this.config.graphFilePath);
  }

  /** Parsed file contents, or null when no file has been written yet. */
  async read(): Promise<unknown> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return null;
      throw err;
    }
    try {
      return JSON.parse(text);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new InvalidInputError('document', `${this.filePath} is not valid JSON: ${reason}`);
    }
  }

  async write(doc: GraphDocument): Promise<string> {
    const target = this.filePath;
    await this.atomicWriteFile(target, `${JSON.stringify(doc, null, 2)}\n`);
    this.logger.debug('Graph document written', { path: target, nodes: doc.nodes.length, edges: doc.edges.length });
    return target;
  }

  // Temp file beside the target, flushed, then renamed over it. The temp file is removed on any failure.
  private async atomicWriteFile(filePath: string, content: string): Promise<void> {
    const dir = path.dirname(filePath);
    await fs.mkdir(dir, { recursive: true });
    const tmp = path.join(dir, `.${path.basename(filePath)}.tmp-${process.pid}-${Date.now()}`);
    try {
      const handle = await fs.open(tmp, 'w');
      try {
        await handle.writeFile(content);
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tmp, filePath);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw err;
    }
    await this.syncDirectory(dir);
  }

  private async syncDirectory(dir: string): Promise<void> {
    try {
      const handle = await fs.open(dir, 'r');
      try {
        await handle.sync();
      } finally {
        await handle.close();
      }
    } catch (err) {
      // Some platforms refuse fsync on directories.
      this.logger.debug('Directory fsync skipped', { dir, error: err });
    }
  }
}
