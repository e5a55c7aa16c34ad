// src/ServiceDeskManager/ServiceDeskExtractManager.ts
import type { AppConfig } from '../config/config';
import { type ExtractProfile, columnTypes, loadProfile, toProjection } from '../config/ExtractProfile';
import { errorMessage } from '../core/errors';
import { sinkOpener } from '../core/persistence';
import type { TableSink } from '../core/persistence/TableSink';
import { ApiServiceManager, type FetchLike } from '../core/utils/ApiServiceManager';
import { AuditService } from '../core/utils/AuditService';
import { type Logger, consoleLogger, formatElapsed } from '../core/utils/Logger';
import { FieldNameResolver } from '../ExtractService/FieldNameResolver';
import { type DegradedField, type UnorderedField, expandAll, normalize } from '../ExtractService/Flattener';
import { Loader } from '../ExtractService/Loader';
import { collate } from '../ExtractService/Pager';
import { project } from '../ExtractService/Projector';
import type { TicketSource } from '../ExtractService/TicketSource';
import { JiraTicketSource } from '../JiraService/JiraTicketSource';

export interface ExtractReport {
  ticketCount: number;
  rowCount: number;
  /** Colonnes chargées, hors colonne d'index. */
  columns: string[];
  /** Expansions abandonnées (sortie dégradée). */
  degraded: DegradedField[];
  /** Expansions dont certaines séquences n'étaient pas triées chronologiquement. */
  unordered: UnorderedField[];
  table: string;
  elapsedMs: number;
}

export interface ServiceDeskExtractDeps {
  source: TicketSource;
  openSink: () => TableSink | Promise<TableSink>;
  profile: ExtractProfile;
  logger?: Logger;
  audit?: AuditService;
}

/**
 * Extraction complète des tickets du service desk vers une table relationnelle
 * (instantané : la table de destination est remplacée à chaque exécution).
 */
export default class ServiceDeskExtractManager {
  private readonly source: TicketSource;
  private readonly openSink: () => TableSink | Promise<TableSink>;
  private readonly logger: Logger;
  private readonly audit?: AuditService;
  public readonly profile: ExtractProfile;

  constructor(deps: ServiceDeskExtractDeps) {
    this.source = deps.source;
    this.openSink = deps.openSink;
    this.profile = deps.profile;
    this.logger = deps.logger ?? consoleLogger;
    this.audit = deps.audit ?? AuditService.current();
  }

  // fabrique async : bibliothèque d'API + profil chargés
  public static async readyFromEnv(config: AppConfig, options: { fetchFn?: FetchLike; logger?: Logger } = {}): Promise<ServiceDeskExtractManager> {
    const api = await ApiServiceManager.create(
      config.apiLibPath,
      {
        JIRA_URL: config.jira.url,
        JIRA_USER: config.jira.user,
        JIRA_PASS: config.jira.password,
      },
      options.fetchFn,
    );
    const profile = await loadProfile(config.profilePath);
    return new ServiceDeskExtractManager({
      source: new JiraTicketSource(api),
      openSink: sinkOpener(config.sink),
      profile,
      logger: options.logger,
    });
  }

  /**
   * Exécute l'extraction de bout en bout.
   * Les erreurs d'expansion sont tolérées (champ ignoré) ; toute autre erreur interrompt le run.
   */
  public async run(): Promise<ExtractReport> {
    const started = Date.now();
    const { query, fields, pageSize, expansions, destination } = this.profile;
    const { runId } = (await this.audit?.beginRun({
      actor: 'ServiceDeskExtractManager',
      adapter: 'jira',
      params: { query, table: destination.table },
    })) ?? { runId: undefined };

    try {
      const tickets = await collate(this.source, query, fields, pageSize, this.logger);
      await this.audit?.logStep(runId, 'FETCH_DONE', undefined, { tickets: tickets.length });

      const { table: expanded, degraded, unordered } = expandAll(normalize(tickets), expansions, this.logger);
      await this.audit?.logStep(
        runId,
        'EXPAND_DONE',
        degraded.length > 0 ? `${degraded.length} expansion(s) ignorée(s)` : undefined,
        { columns: expanded.columns.length, degraded: degraded.map((d) => ({ field: d.field, error: d.error.message })), unordered },
        degraded.length > 0 || unordered.length > 0 ? 'WARN' : 'INFO',
      );

      const resolver = await FieldNameResolver.fetch(this.source, this.logger);
      const renamed = resolver.apply(expanded);
      await this.audit?.logStep(runId, 'RENAME_DONE', undefined, { customFields: resolver.size });

      const output = project(renamed, toProjection(this.profile));
      await this.audit?.logStep(runId, 'PROJECT_DONE', undefined, { columns: output.names });

      const loader = new Loader(this.openSink, { batchSize: destination.batchSize, logger: this.logger });
      const rowCount = await loader.load(output, destination.table, columnTypes(this.profile));
      await this.audit?.logStep(runId, 'LOAD_DONE', undefined, { table: destination.table, rows: rowCount });

      const elapsedMs = Date.now() - started;
      this.logger('info', `Succès. Extraction terminée en ${formatElapsed(elapsedMs)}`);
      await this.audit?.endRun(runId, 'SUCCESS');

      return {
        ticketCount: tickets.length,
        rowCount,
        columns: output.names,
        degraded,
        unordered,
        table: destination.table,
        elapsedMs,
      };
    } catch (err) {
      this.logger('error', `Échec de l'extraction: ${errorMessage(err)}`);
      await this.audit?.endRun(runId, 'FAILURE', err);
      throw err;
    }
  }
}
