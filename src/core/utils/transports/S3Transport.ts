/**
 * Transport S3 pour la lecture de fichiers depuis un bucket AWS S3.
 * S3 transport for reading files from an AWS S3 bucket.
 */

import { GetObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type { FileTransport, FileReadResult } from './FileTransport';

export interface S3Object {
  body: string;
  lastModified?: Date;
}

/** Lecture d'un objet ; injectable pour les tests. */
export type S3ObjectFetcher = (bucket: string, key: string) => Promise<S3Object>;

export function s3ClientFetcher(client: S3Client): S3ObjectFetcher {
  return async (bucket, key) => {
    const response = await client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    if (!response.Body) {
      throw new Error(`Objet S3 vide: s3://${bucket}/${key}`);
    }
    return {
      body: await response.Body.transformToString('utf-8'),
      lastModified: response.LastModified,
    };
  };
}

/**
 * Décompose une URL `s3://bucket/key`.
 */
export function parseS3Url(url: string): { bucket: string; key: string } {
  const match = /^s3:\/\/([^/]+)\/(.+)$/.exec(url);
  if (!match) {
    throw new Error(`URL S3 invalide: ${url}`);
  }
  return { bucket: match[1], key: match[2] };
}

/**
 * S3Transport lit des objets `s3://bucket/key` en entier.
 */
export class S3Transport implements FileTransport {
  private readonly fetchObject: S3ObjectFetcher;

  /**
   * @param fetcherOrClient S3Client configuré (credentials, région...) ou fonction de lecture.
   */
  constructor(fetcherOrClient: S3Client | S3ObjectFetcher) {
    this.fetchObject = fetcherOrClient instanceof S3Client ? s3ClientFetcher(fetcherOrClient) : fetcherOrClient;
  }

  public supports(pathOrUrl: string): boolean {
    return pathOrUrl.startsWith('s3://');
  }

  public async readAll(url: string): Promise<FileReadResult> {
    const { bucket, key } = parseS3Url(url);
    const object = await this.fetchObject(bucket, key);

    return {
      data: object.body,
      metadata: {
        updatedAt: object.lastModified ?? new Date(),
      },
    };
  }
}
