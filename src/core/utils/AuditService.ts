import * as fsp from 'fs/promises';
import * as fs from 'fs';
import { createHmac, randomUUID } from 'crypto';
import * as path from 'path';

// Stable JSON stringify to ensure deterministic HMAC across identical objects
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') return JSON.stringify(value) ?? 'null';
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(',')}]`;
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',')}}`;
}

export type AuditStatus = 'INIT' | 'STARTED' | 'INFO' | 'WARN' | 'SUCCESS' | 'FAILURE';

/**
 * Structure d'un événement d'audit.
 */
export interface AuditEvent {
  timestamp: string; // ISO 8601 UTC
  actor: string; // identifiant du service ou de l'utilisateur
  event: string; // type d'action (p.ex. "FILE_LOADED")
  resource?: string; // cible (chemin de fichier, table, etc.)
  status?: AuditStatus;
  details?: unknown; // champ libre pour infos additionnelles
  hmac?: string; // HMAC-SHA256 (champ canonique)
}

/**
 * Interface d'un transport d'audit (fichier, mémoire...).
 */
export interface AuditTransport {
  /**
   * Envoie une entrée d'audit. Ne doit jamais rejeter (erreurs internes capturées).
   */
  log(event: AuditEvent): Promise<void>;
}

/**
 * Transport de base : écrit en JSONL dans un fichier append-only.
 */
export class FileAuditTransport implements AuditTransport {
  private filePath: string;

  constructor(filePath: string) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    this.filePath = filePath;
  }

  async log(event: AuditEvent): Promise<void> {
    try {
      await fsp.appendFile(this.filePath, JSON.stringify(event) + '\n', 'utf-8');
    } catch (err) {
      console.error('AuditTransport(File) error:', err);
    }
  }
}

export interface AuditOptions {
  enabled: boolean;
  logFile: string;
  hmacKey?: string;
}

function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return { name: error.name, message: error.message, code, stack: error.stack };
  }
  return error ?? null;
}

/**
 * Service d'audit singleton.
 */
export class AuditService {
  private static instance?: AuditService;

  private constructor(
    private readonly transports: AuditTransport[],
    private readonly hmacKey?: string,
  ) {}

  /**
   * Renvoie l'unique instance.
   * @param transports Liste des transports à utiliser (ex. [new FileAuditTransport(...)])
   * @param hmacKey   Clé secrète pour générer la signature HMAC (optionnel)
   */
  public static getInstance(transports?: AuditTransport[], hmacKey?: string): AuditService {
    if (!AuditService.instance) {
      if (!transports) {
        throw new Error('AuditService must be initialized with transports');
      }
      AuditService.instance = new AuditService(transports, hmacKey);
    }
    return AuditService.instance;
  }

  /** Instance courante, si l'audit a été initialisé. */
  public static current(): AuditService | undefined {
    return AuditService.instance;
  }

  /**
   * Initialise l'audit à partir de la configuration.
   * Audit désactivé => aucun transport (les appels restent valides).
   */
  public static configure(options: AuditOptions): AuditService {
    const transports = options.enabled ? [new FileAuditTransport(options.logFile)] : [];
    AuditService.instance = new AuditService(transports, options.hmacKey);
    return AuditService.instance;
  }

  public static resetInstance(): void {
    AuditService.instance = undefined;
  }

  /**
   * Enregistre un événement d'audit.
   */
  public async log(event: Omit<AuditEvent, 'timestamp' | 'hmac'>): Promise<void> {
    const entry: AuditEvent = {
      timestamp: new Date().toISOString(),
      ...event,
    };

    // Signature déterministe si une clé est fournie ; le champ hmac n'est pas signé
    if (this.hmacKey) {
      entry.hmac = createHmac('sha256', this.hmacKey).update(stableStringify(entry)).digest('hex');
    }

    await Promise.all(this.transports.map((t) => t.log(entry).catch((err: unknown) => console.error('AuditService transport error:', err))));
  }

  /**
   * Démarre une exécution (run) et retourne un run_id corrélable.
   * Journalise SYNC_RUN_START.
   */
  public async beginRun(info: { actor: string; adapter?: string; instanceId?: string; params?: unknown }): Promise<{ runId: string }> {
    const runId = randomUUID();
    await this.log({
      actor: info.actor,
      event: 'SYNC_RUN_START',
      resource: info.adapter ? `${info.adapter}${info.instanceId ? ':' + info.instanceId : ''}` : undefined,
      status: 'STARTED',
      details: { params: info.params, adapter: info.adapter, instanceId: info.instanceId, run_id: runId },
    });
    return { runId };
  }

  /** Journalise une étape intermédiaire liée à un run (SYNC_STEP). */
  public async logStep(runId: string | undefined, step: string, message?: string, details?: Record<string, unknown>, status: AuditStatus = 'INFO'): Promise<void> {
    if (!runId) return;
    await this.log({
      actor: 'system',
      event: 'SYNC_STEP',
      status,
      details: { step, message, run_id: runId, ...(details ?? {}) },
    });
  }

  /** Termine un run (SYNC_RUN_END) avec statut final. */
  public async endRun(runId: string | undefined, status: 'SUCCESS' | 'FAILURE', error?: unknown): Promise<void> {
    if (!runId) return;
    await this.log({
      actor: 'system',
      event: 'SYNC_RUN_END',
      status,
      details: { run_id: runId, error: serializeError(error) },
    });
  }
}

export default AuditService;
