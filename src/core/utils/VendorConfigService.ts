import type { EndpointConfig, VendorConfig } from '../../config/api/IApi';

/**
 * Service spécifique à un vendor de la bibliothèque d'API.
 */
export class VendorConfigService {
  constructor(private readonly entry: VendorConfig) {}

  /**
   * Retourne les endpoints actifs définis pour ce vendor.
   */
  public getEndpoints(): EndpointConfig[] {
    return this.entry.endpoints.filter((e) => e.enabled);
  }

  /**
   * Retourne l'endpoint actif de ce nom (case-insensitive).
   */
  public getEndpoint(name: string): EndpointConfig | undefined {
    const key = name.toLowerCase();
    return this.getEndpoints().find((e) => e.name.toLowerCase() === key);
  }

  /**
   * Retourne la configuration complète de l'entrée vendor
   * (baseURL, apiAccess, endpoints).
   */
  public getConfig(): VendorConfig {
    return this.entry;
  }
}
