export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Callback de journalisation injectable.
 * Les composants l'appellent au lieu d'écrire directement dans `console`.
 */
export type Logger = (level: LogLevel, message: string, meta?: Record<string, unknown>) => void;

export const consoleLogger: Logger = (level, message, meta) => {
  const line = `[servicedesk-extract] ${message}`;
  if (meta && Object.keys(meta).length > 0) {
    console[level](line, meta);
  } else {
    console[level](line);
  }
};

export const silentLogger: Logger = () => undefined;

/**
 * Durée au format H:MM:SS.mmm
 */
export function formatElapsed(ms: number): string {
  const totalMs = Math.max(0, Math.round(ms));
  const hours = Math.floor(totalMs / 3_600_000);
  const minutes = Math.floor((totalMs % 3_600_000) / 60_000);
  const seconds = Math.floor((totalMs % 60_000) / 1000);
  const millis = totalMs % 1000;
  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  return `${hours}:${pad(minutes)}:${pad(seconds)}.${pad(millis, 3)}`;
}
