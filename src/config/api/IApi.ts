import { z } from 'zod';

/**
 * Bibliothèque d'API : un fichier JSON décrivant, par vendor, l'URL de base,
 * le mode d'authentification et les endpoints appelables.
 * Les valeurs peuvent contenir des placeholders `${NOM}` résolus à l'exécution.
 */
export const endpointSchema = z.object({
  name: z.string().min(1),
  enabled: z.boolean().default(true),
  path: z.string().startsWith('/'),
  method: z.enum(['GET', 'POST']).default('GET'),
  headers: z.record(z.string()).default({}),
  /** Sérialisation des tableaux en query string : `a=1&a=2` ou `a=1,2`. */
  arrayFormat: z.enum(['repeat', 'comma']).default('repeat'),
});

export const apiAccessSchema = z.object({
  scheme: z.enum(['basic', 'bearer']).default('basic'),
  userEnv: z.string().optional(),
  tokenEnv: z.string(),
});

export const vendorSchema = z.object({
  vendor: z.string().min(1),
  baseURL: z.string().min(1),
  apiAccess: apiAccessSchema,
  endpoints: z.array(endpointSchema),
});

export const apiLibrarySchema = z.object({
  vendors: z.array(vendorSchema).min(1),
});

export type EndpointConfig = z.infer<typeof endpointSchema>;
export type ApiAccess = z.infer<typeof apiAccessSchema>;
export type VendorConfig = z.infer<typeof vendorSchema>;
export type ApiLibrary = z.infer<typeof apiLibrarySchema>;
