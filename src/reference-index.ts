/**
 * Which local files each rendered page embeds, and the reverse. Filled in by
 * the render cache when a page renders; read by the change coordinator to
 * find the pages an asset change should reload.
 */
export class ReferenceIndex {
  private readonly embedsByPage = new Map<string, Set<string>>();
  private readonly pagesByAsset = new Map<string, Set<string>>();

  setPageReferences(page: string, assets: Iterable<string>): void {
    this.forgetPage(page);

    const embeds = new Set(assets);
    if (embeds.size === 0) {
      return;
    }
    this.embedsByPage.set(page, embeds);
    for (const asset of embeds) {
      let pages = this.pagesByAsset.get(asset);
      if (!pages) {
        pages = new Set();
        this.pagesByAsset.set(asset, pages);
      }
      pages.add(page);
    }
  }

  forgetPage(page: string): void {
    const embeds = this.embedsByPage.get(page);
    if (!embeds) {
      return;
    }
    this.embedsByPage.delete(page);
    for (const asset of embeds) {
      const pages = this.pagesByAsset.get(asset);
      pages?.delete(page);
      if (pages?.size === 0) {
        this.pagesByAsset.delete(asset);
      }
    }
  }

  assetsOf(page: string): string[] {
    return [...(this.embedsByPage.get(page) ?? [])];
  }

  pagesEmbedding(asset: string): string[] {
    return [...(this.pagesByAsset.get(asset) ?? [])];
  }
}
