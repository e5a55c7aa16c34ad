import type { EndpointConfig, VendorConfig } from '../../config/api/IApi';
import { ConfigurationError, SourceError, errorMessage } from '../errors';
import { ApiConfigService } from './ApiConfigService';

export type QueryValue = string | number | boolean | readonly (string | number)[] | null | undefined;
export type QueryParams = Record<string, QueryValue>;

/** Signature minimale de `fetch` (injectable pour les tests). */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/** Valeurs disponibles pour les placeholders `${NOM}` de la bibliothèque d'API. */
export type ApiVariables = Readonly<Record<string, string | undefined>>;

export class ApiServiceManager {
  constructor(
    private readonly apiConfig: ApiConfigService,
    private readonly variables: ApiVariables,
    private readonly fetchFn: FetchLike = fetch,
  ) {}

  public static async create(apiLibPath: string, variables: ApiVariables, fetchFn?: FetchLike): Promise<ApiServiceManager> {
    const apiConfig = await ApiConfigService.load(apiLibPath);
    return new ApiServiceManager(apiConfig, variables, fetchFn);
  }

  /**
   * Appelle un endpoint et retourne le JSON décodé (non validé).
   * @param vendorName Nom du vendor (case-insensitive)
   * @param endpointName Nom de l'endpoint (case-insensitive)
   * @param params Paramètres de requête (query pour GET, body JSON sinon)
   * @throws SourceError si le serveur est injoignable ou répond en erreur
   */
  public async getData(vendorName: string, endpointName: string, params: QueryParams = {}): Promise<unknown> {
    const vendor = this.apiConfig.getVendorService(vendorName).getConfig();
    const endpoint = this.apiConfig.getEndpoint(vendorName, endpointName);
    if (!endpoint) {
      throw new ConfigurationError(`Endpoint '${endpointName}' introuvable pour le vendor '${vendorName}'.`);
    }

    const { url, options } = this.buildRequestConfig(vendor, endpoint, params);

    let res: Response;
    try {
      res = await this.fetchFn(url, options);
    } catch (err) {
      throw new SourceError(0, `${endpoint.name}: ${errorMessage(err)}`, err);
    }
    if (!res.ok) {
      throw new SourceError(res.status, `${endpoint.name}: ${await res.text()}`);
    }
    try {
      return await res.json();
    } catch (err) {
      throw new SourceError(res.status, `${endpoint.name}: réponse JSON invalide`, err);
    }
  }

  private substitute(template: string): string {
    return template.replace(/\$\{(\w+)\}/g, (_, name: string) => {
      const value = this.variables[name];
      if (value === undefined || value === '') {
        throw new ConfigurationError(`Variable '${name}' non définie`);
      }
      return value;
    });
  }

  /**
   * Prépare URL, headers et body/query en fonction de l'endpoint et des paramètres
   */
  private buildRequestConfig(vendor: VendorConfig, endpoint: EndpointConfig, params: QueryParams): { url: string; options: RequestInit } {
    // Concaténation (et non new URL(path, base)) pour conserver un éventuel context path
    const baseURL = this.substitute(vendor.baseURL).replace(/\/+$/, '');
    const url = new URL(baseURL + endpoint.path);

    if (endpoint.method === 'GET') {
      for (const [key, value] of Object.entries(params)) {
        if (value === undefined || value === null) continue;
        if (Array.isArray(value)) {
          if (value.length === 0) continue;
          if (endpoint.arrayFormat === 'comma') {
            url.searchParams.append(key, value.join(','));
          } else {
            value.forEach((v) => url.searchParams.append(key, String(v)));
          }
        } else {
          url.searchParams.append(key, String(value));
        }
      }
    }

    const headers: Record<string, string> = {};
    for (const [key, value] of Object.entries(endpoint.headers)) {
      headers[key] = this.substitute(value);
    }
    let body: string | undefined;
    if (endpoint.method !== 'GET') {
      body = JSON.stringify(params);
      headers['Content-Type'] = headers['Content-Type'] || 'application/json';
    }
    if (!headers['Authorization']) {
      headers['Authorization'] = this.buildAuthHeader(vendor);
    }

    return {
      url: url.toString(),
      options: { method: endpoint.method, headers, body },
    };
  }

  /**
   * Construit l'en-tête Authorization selon la config d'accès API
   *  - scheme === 'bearer' -> Bearer <tokenEnv>
   *  - scheme === 'basic'  -> Basic base64(user:token)
   */
  private buildAuthHeader(vendor: VendorConfig): string {
    const { scheme, userEnv, tokenEnv } = vendor.apiAccess;
    const token = this.variables[tokenEnv];
    if (!token) {
      throw new ConfigurationError(`Identifiant manquant: ${tokenEnv}`);
    }

    if (scheme === 'bearer') {
      return `Bearer ${token}`;
    }
    const user = userEnv ? this.variables[userEnv] : undefined;
    if (!user) {
      throw new ConfigurationError(`Identifiant manquant: ${userEnv ?? 'userEnv'}`);
    }
    return `Basic ${Buffer.from(`${user}:${token}`, 'utf8').toString('base64')}`;
  }
}
