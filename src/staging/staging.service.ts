import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { access, mkdir, mkdtemp } from 'fs/promises';
import { constants } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { StagingArea } from './staging-area';
import { StagingError } from '../conversion/errors/conversion-errors';

@Injectable()
export class StagingService {
  private readonly logger = new Logger(StagingService.name);
  private readonly stagingRoot: string;

  constructor(private readonly configService: ConfigService) {
    this.stagingRoot = this.configService.get<string>(
      'STAGING_ROOT',
      join(tmpdir(), 'office-convert'),
    );
  }

  get root(): string {
    return this.stagingRoot;
  }

  /**
   * Create the staging area of one request
   * @throws StagingError if the directory cannot be created
   */
  async create(): Promise<StagingArea> {
    try {
      await mkdir(this.stagingRoot, { recursive: true });
      const dir = await mkdtemp(join(this.stagingRoot, 'req-'));
      this.logger.debug(`Created staging area ${dir}`);
      return new StagingArea(dir);
    } catch (error) {
      throw new StagingError(
        `Cannot create staging area under ${this.stagingRoot}`,
        error,
      );
    }
  }

  /**
   * Remove a staging area. Failures are logged only.
   */
  async release(area: StagingArea): Promise<void> {
    try {
      await area.dispose();
      this.logger.debug(`Removed staging area ${area.root}`);
    } catch (error) {
      this.logger.error(
        `Failed to remove staging area ${area.root}`,
        error instanceof Error ? error.stack : String(error),
      );
    }
  }

  /**
   * Whether the staging root exists (or can be created) and is writable
   */
  async isWritable(): Promise<boolean> {
    try {
      await mkdir(this.stagingRoot, { recursive: true });
      await access(this.stagingRoot, constants.W_OK);
      return true;
    } catch {
      return false;
    }
  }
}
