import { UnresolvedFieldError } from '../core/errors';
import { type Logger, consoleLogger } from '../core/utils/Logger';
import type { ColumnPath, Table } from './Table';
import type { CustomFieldEntry, TicketSource } from './TicketSource';

export const CUSTOM_FIELD_TOKEN = /^customfield_\d+$/;

/**
 * Remplace les identifiants de champs personnalisés (`customfield_NNNNN`) par leur
 * nom d'affichage, segment par segment. Les autres segments ne sont pas touchés.
 */
export class FieldNameResolver {
  private constructor(private readonly lookup: ReadonlyMap<string, string>) {}

  public static fromEntries(entries: readonly CustomFieldEntry[]): FieldNameResolver {
    return new FieldNameResolver(new Map(entries.map((e) => [e.id, e.name])));
  }

  /** Récupère une seule fois la table de correspondance auprès de la source. */
  public static async fetch(source: TicketSource, logger: Logger = consoleLogger): Promise<FieldNameResolver> {
    logger('info', 'Récupération des noms de champs personnalisés...');
    const entries = await source.getCustomFields();
    logger('info', `${entries.length} champs personnalisés`);
    return FieldNameResolver.fromEntries(entries);
  }

  public get size(): number {
    return this.lookup.size;
  }

  /**
   * @throws UnresolvedFieldError si un identifiant n'a pas d'entrée
   */
  public resolvePath(path: ColumnPath): ColumnPath {
    return path.map((segment) => {
      if (!CUSTOM_FIELD_TOKEN.test(segment)) return segment;
      const name = this.lookup.get(segment);
      if (name === undefined) throw new UnresolvedFieldError(segment);
      return name;
    });
  }

  public apply(table: Table): Table {
    return table.renamed((path) => this.resolvePath(path));
  }
}
