/**
 * FileReadResult représente le résultat de la lecture complète d'un fichier.
 */
export interface FileReadResult {
  /** Contenu du fichier (UTF-8). */
  data: string;
  /** Métadonnées du fichier lues depuis la source. */
  metadata: {
    /** Date de dernière modification du fichier. */
    updatedAt: Date;
  };
}

/**
 * FileTransport définit l'interface pour lire des fichiers
 * depuis différentes sources (disque local, S3).
 */
export interface FileTransport {
  /** Indique si ce transport sait lire le chemin ou l'URL donné. */
  supports(pathOrUrl: string): boolean;

  /**
   * Lit entièrement le fichier (ou l'objet) et retourne son contenu et ses métadonnées.
   *
   * @param pathOrUrl Chemin ou URL du fichier à lire.
   */
  readAll(pathOrUrl: string): Promise<FileReadResult>;
}
