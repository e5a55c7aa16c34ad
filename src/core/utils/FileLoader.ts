import * as path from 'path';
import { createHash } from 'crypto';
import { S3Client } from '@aws-sdk/client-s3';

import { errorMessage } from '../errors';
import { isParsable, parseContent } from './parsers';
import { AuditService } from './AuditService';
import { SimpleLRUCache } from './SimpleLRUCache';
import type { FileTransport } from './transports/FileTransport';
import { LocalTransport } from './transports/LocalTransport';
import { S3Transport } from './transports/S3Transport';

/**
 * Métadonnées retournées par FileLoader.
 */
export interface FileMetadata {
  path: string;
  name: string;
  extension: string;
  updatedAt: Date;
  fingerprint: string;
  /** Contenu parsé pour .json / .csv, absent sinon. */
  content?: unknown;
  raw: string;
}

const REMOTE = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Chargement de fichiers (disque local ou s3://) avec audit et cache LRU+TTL.
 * Le cache survit entre deux exécutions d'un même processus.
 */
export class FileLoader {
  private static instance?: FileLoader;
  private cache: SimpleLRUCache<string, FileMetadata>;
  private static readonly ttlMs = 5 * 60 * 1000; // 5 min

  private constructor(
    private readonly transports: FileTransport[],
    private readonly baseDir: string,
  ) {
    this.cache = new SimpleLRUCache<string, FileMetadata>(100, FileLoader.ttlMs);
  }

  /** Récupère l'instance unique. */
  public static getInstance(baseDir?: string, transports?: FileTransport[]): FileLoader {
    if (!FileLoader.instance) {
      const dir = baseDir ?? process.cwd();
      const tx = transports ?? [new LocalTransport(dir), new S3Transport(new S3Client({}))];
      FileLoader.instance = new FileLoader(tx, dir);
    }
    return FileLoader.instance;
  }

  public static resetInstance(): void {
    FileLoader.instance = undefined;
  }

  /** Vide intégralement le cache. */
  public clearCache(): void {
    this.cache.clear();
  }

  /**
   * Invalide l'entrée de cache d'un fichier.
   * @param filePath chemin relatif, absolu ou URL
   */
  public invalidate(filePath: string): void {
    this.cache.delete(this.cacheKey(filePath));
  }

  private cacheKey(filePath: string): string {
    if (REMOTE.test(filePath) || path.isAbsolute(filePath)) return filePath;
    return path.resolve(this.baseDir, filePath);
  }

  private transportFor(filePath: string): FileTransport {
    const transport = this.transports.find((t) => t.supports(filePath));
    if (!transport) {
      throw new Error(`Aucun transport pour ${filePath}`);
    }
    return transport;
  }

  /**
   * Charge un fichier avec audit et cache.
   * @throws Error en cas d'échec I/O
   * @throws FileParsingError si le parsing JSON/CSV échoue
   */
  public async load(filePath: string): Promise<FileMetadata> {
    const key = this.cacheKey(filePath);
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }

    const audit = AuditService.current();
    await audit?.log({ actor: 'FileLoader', event: 'FILE_LOAD_START', resource: filePath, status: 'INIT' });

    let metadata: FileMetadata;
    try {
      const { data: raw, metadata: stats } = await this.transportFor(filePath).readAll(filePath);
      const extension = path.extname(key).toLowerCase();
      metadata = {
        path: key,
        name: path.basename(key),
        extension,
        updatedAt: stats.updatedAt,
        fingerprint: createHash('sha256').update(raw).digest('hex'),
        content: isParsable(extension) ? parseContent(extension, raw) : undefined,
        raw,
      };
    } catch (err) {
      await audit?.log({ actor: 'FileLoader', event: 'FILE_LOAD_ERROR', resource: filePath, status: 'FAILURE', details: errorMessage(err) });
      throw err;
    }

    await audit?.log({ actor: 'FileLoader', event: 'FILE_LOADED', resource: filePath, status: 'SUCCESS', details: { fingerprint: metadata.fingerprint, updatedAt: metadata.updatedAt.toISOString() } });

    this.cache.set(key, metadata);
    return metadata;
  }
}
