// src/core/utils/ApiConfigService.ts
import { type ApiLibrary, type EndpointConfig, apiLibrarySchema } from '../../config/api/IApi';
import { ConfigurationError } from '../errors';
import { FileLoader } from './FileLoader';
import { VendorConfigService } from './VendorConfigService';

export class ApiConfigService {
  private readonly vendors: Map<string, VendorConfigService>;

  private constructor(library: ApiLibrary) {
    this.vendors = new Map(library.vendors.map((v) => [v.vendor.toLowerCase(), new VendorConfigService(v)]));
  }

  public static fromLibrary(library: unknown, source = 'bibliothèque API'): ApiConfigService {
    const parsed = apiLibrarySchema.safeParse(library);
    if (!parsed.success) {
      throw new ConfigurationError(`${source} invalide: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    }
    return new ApiConfigService(parsed.data);
  }

  /**
   * Charge la bibliothèque d'API (JSON) via FileLoader.
   * @param libraryPath chemin local ou s3://
   */
  public static async load(libraryPath: string, loader: FileLoader = FileLoader.getInstance()): Promise<ApiConfigService> {
    const meta = await loader.load(libraryPath);
    return ApiConfigService.fromLibrary(meta.content, libraryPath);
  }

  public getVendorService(vendorName: string): VendorConfigService {
    const svc = this.vendors.get(vendorName.toLowerCase());
    if (!svc) {
      throw new ConfigurationError(`Vendor inconnu : ${vendorName}`);
    }
    return svc;
  }

  public getEndpoint(vendorName: string, endpointName: string): EndpointConfig | undefined {
    return this.getVendorService(vendorName).getEndpoint(endpointName);
  }
}
