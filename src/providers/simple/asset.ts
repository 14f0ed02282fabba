import { success } from '../types.js';
import type { Asset, AssetProvider, AssetQueryOptions, CallContext, ProviderResult } from '../types.js';

/**
 * Placeholder stock footage: solid-colour image slots the renderer fills in.
 */
export class SimpleAssetProvider implements AssetProvider {
  readonly id = 'simple';

  async gather(query: string, options: AssetQueryOptions, _ctx: CallContext): Promise<ProviderResult<Asset[]>> {
    const slug = query.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-|-$/g, '') || 'untitled';
    const assets: Asset[] = [];
    for (let i = 0; i < options.limit; i++) {
      assets.push({ url: `placeholder://${slug}/${i + 1}`, kind: 'image', license: 'placeholder' });
    }
    return success(assets);
  }
}
