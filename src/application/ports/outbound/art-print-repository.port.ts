import { ArtPrint, ArtPrintDraft } from '@domain/entities';
import { PrintId } from '@domain/value-objects';

/**
 * Filter for catalog listings. Omitted fields do not filter.
 */
export interface ArtPrintFilter {
  readonly featured?: boolean;
}

/**
 * Outbound port for catalog persistence.
 *
 * @example
 * ```typescript
 * const draft = ArtPrint.draft({ title: 'Sunlit Dunes', artist: 'Ava Linden', price: 49 });
 * const print = await this.artPrintRepository.create(draft);
 * ```
 */
export interface IArtPrintRepositoryPort {
  /**
   * Inserts a new print and returns it as stored, with its assigned id
   * and timestamps.
   *
   * @throws Error if the store rejects the insert
   */
  create(draft: ArtPrintDraft): Promise<ArtPrint>;

  /**
   * Inserts several prints in one batch.
   *
   * @returns Number of inserted prints
   */
  createMany(drafts: readonly ArtPrintDraft[]): Promise<number>;

  /**
   * Retrieves a print by its identifier.
   *
   * @returns The print if found, null otherwise
   */
  findById(id: PrintId): Promise<ArtPrint | null>;

  /**
   * Retrieves all prints matching the filter, in store order.
   */
  findAll(filter?: ArtPrintFilter): Promise<ArtPrint[]>;

  /**
   * Counts prints matching the filter.
   */
  count(filter?: ArtPrintFilter): Promise<number>;
}
