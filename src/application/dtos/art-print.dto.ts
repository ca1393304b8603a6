/**
 * DTOs for catalog use cases.
 */

export interface CreatePrintInputDto {
  readonly title: string;
  readonly artist: string;
  readonly description?: string;
  readonly price: number;
  readonly size?: string;
  readonly imageUrl?: string;
  readonly tags?: readonly string[];
  readonly inStock?: boolean;
  readonly featured?: boolean;
}

/**
 * Catalog listing filter. An undefined flag means "no filter".
 */
export interface ListPrintsInputDto {
  readonly featured?: boolean;
}

/**
 * Public representation of an art print.
 * Stored fields outside this shape are passed through as they are.
 */
export interface ArtPrintOutputDto {
  readonly [field: string]: unknown;
  readonly id: string;
  readonly title: string;
  readonly artist: string;
  readonly description: string;
  readonly price: number;
  readonly size: string | null;
  readonly image_url: string | null;
  readonly tags: string[];
  readonly in_stock: boolean;
  readonly featured: boolean;
  readonly created_at: string | null;
  readonly updated_at: string | null;
}
