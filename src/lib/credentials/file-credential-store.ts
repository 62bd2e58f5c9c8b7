/**
 * File credential store
 *
 * Looks for the credential document in this order:
 *   1. <cwd>/test/<fileName>                 (when includeTestDirectory)
 *   2. nearest ancestor whose package.json `name` equals projectMarker
 *   3. <cwd>/<fileName>
 * A missing file can optionally be replaced by a template with placeholders.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { resolveCredentialBundle } from './auth-method';
import {
  buildCredentialTemplate,
  credentialDocumentSchema,
  documentToRawCredentials,
} from './credentials.schemas';
import type {
  CredentialBundle,
  CredentialStore,
  RawCredentials,
} from './credentials.types';
import { createLogger, errorMessage, type Logger } from '../logging/logger';

export const DEFAULT_CREDENTIAL_FILE = 'open_prices_credentials.json';
export const DEFAULT_PROJECT_MARKER = 'product-facts-resolver';

export type FileCredentialStoreOptions = {
  fileName?: string;
  cwd?: string;
  /** package.json name that marks the project root; null = nearest package.json */
  projectMarker?: string | null;
  includeTestDirectory?: boolean;
  createTemplate?: boolean;
  logger?: Logger;
};

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function readPackageName(packageJsonPath: string): Promise<string | null> {
  try {
    const content = await fs.readFile(packageJsonPath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (parsed && typeof parsed === 'object' && 'name' in parsed) {
      return typeof parsed.name === 'string' ? parsed.name : null;
    }
    return null;
  } catch {
    return null;
  }
}

export class FileCredentialStore implements CredentialStore {
  private readonly fileName: string;
  private readonly cwd: string;
  private readonly projectMarker: string | null;
  private readonly includeTestDirectory: boolean;
  private readonly createTemplate: boolean;
  private readonly logger: Logger;
  private raw: RawCredentials | null = null;
  private loadedFrom: string | null = null;

  constructor(options: FileCredentialStoreOptions = {}) {
    this.fileName = options.fileName ?? DEFAULT_CREDENTIAL_FILE;
    this.cwd = options.cwd ?? process.cwd();
    this.projectMarker =
      options.projectMarker === undefined
        ? DEFAULT_PROJECT_MARKER
        : options.projectMarker;
    this.includeTestDirectory = options.includeTestDirectory ?? true;
    this.createTemplate = options.createTemplate ?? false;
    this.logger = options.logger ?? createLogger('Credentials');
  }

  get origin(): string {
    return this.loadedFrom ? `file:${this.loadedFrom}` : 'file';
  }

  /** Path the store reads from (or would create the template at) */
  async locate(): Promise<string> {
    if (this.includeTestDirectory) {
      const testFile = path.join(this.cwd, 'test', this.fileName);
      if (await fileExists(testFile)) return testFile;
    }

    let current = path.resolve(this.cwd);
    for (;;) {
      const packageJson = path.join(current, 'package.json');
      if (await fileExists(packageJson)) {
        const name = await readPackageName(packageJson);
        if (this.projectMarker === null || name === this.projectMarker) {
          return path.join(current, this.fileName);
        }
      }
      const parent = path.dirname(current);
      if (parent === current) break;
      current = parent;
    }

    return path.join(this.cwd, this.fileName);
  }

  async load(): Promise<void> {
    this.raw = null;
    this.loadedFrom = null;
    const filePath = await this.locate();

    if (!(await fileExists(filePath))) {
      if (this.createTemplate) await this.writeTemplate(filePath);
      else this.logger.debug('No credential file at', filePath);
      return;
    }

    try {
      const content = await fs.readFile(filePath, 'utf-8');
      const parsed = credentialDocumentSchema.safeParse(JSON.parse(content));
      if (!parsed.success) {
        this.logger.warn(
          'Credential file has an unexpected shape:',
          filePath,
          parsed.error.issues.map((i) => i.path.join('.')).join(', '),
        );
        return;
      }
      this.raw = documentToRawCredentials(parsed.data);
      this.loadedFrom = filePath;
      this.logger.info('Loaded credentials from', filePath);
    } catch (err) {
      this.logger.error('Error loading credentials:', errorMessage(err));
    }
  }

  resolve(): CredentialBundle {
    return resolveCredentialBundle(this.raw ?? {});
  }

  hasCredentials(): boolean {
    return this.raw != null;
  }

  clear(): void {
    this.raw = null;
    this.loadedFrom = null;
  }

  private async writeTemplate(filePath: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(
        filePath,
        JSON.stringify(buildCredentialTemplate(this.fileName), null, 2),
        'utf-8',
      );
      this.logger.info('Created credential template:', filePath);
    } catch (err) {
      this.logger.error(
        'Error creating credential template:',
        errorMessage(err),
      );
    }
  }
}
