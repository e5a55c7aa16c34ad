#!/usr/bin/env node
import 'dotenv/config';

import { loadConfig } from './config/config';
import { errorMessage } from './core/errors';
import { AuditService } from './core/utils/AuditService';
import { consoleLogger } from './core/utils/Logger';
import ServiceDeskExtractManager from './ServiceDeskManager/ServiceDeskExtractManager';

/**
 * Point d'entrée unique (lancement planifié ou fonction serverless).
 * @returns true si l'extraction est allée jusqu'au chargement
 */
export async function handler(): Promise<boolean> {
  try {
    const config = loadConfig();
    AuditService.configure(config.audit);
    const manager = await ServiceDeskExtractManager.readyFromEnv(config);
    const report = await manager.run();
    for (const { field } of report.degraded) {
      consoleLogger('warn', `Champ non expansé: ${field}`);
    }
    consoleLogger('info', `${report.rowCount} lignes chargées dans ${report.table}`);
    return true;
  } catch (err) {
    consoleLogger('error', errorMessage(err));
    return false;
  }
}

async function main(): Promise<void> {
  process.exitCode = (await handler()) ? 0 : 1;
}

if (require.main === module) {
  main().catch((err: unknown) => {
    consoleLogger('error', errorMessage(err));
    process.exitCode = 1;
  });
}
