import { InvalidValueException } from '../exceptions';
import { PrintId } from '../value-objects';

/**
 * Catalog fields of an art print, before the store assigns it an id.
 */
export interface ArtPrintDraft {
  readonly title: string;
  readonly artist: string;
  readonly description: string;
  readonly price: number;
  readonly size: string | null;
  readonly imageUrl: string | null;
  readonly tags: readonly string[];
  readonly inStock: boolean;
  readonly featured: boolean;
}

/**
 * Entity representing an art print in the catalog.
 * Prints are created once and never updated or deleted by this service.
 */
export class ArtPrint {
  private constructor(
    public readonly id: PrintId,
    private readonly props: ArtPrintDraft,
    public readonly createdAt: Date | null,
    public readonly updatedAt: Date | null,
    /** Stored fields outside the known shape, kept for the public view. */
    public readonly additionalFields: Readonly<Record<string, unknown>>,
  ) {}

  /**
   * Normalizes and validates catalog input for a new print.
   * Optional fields fall back to their catalog defaults and tags are de-duplicated.
   */
  static draft(input: {
    title: string;
    artist: string;
    description?: string | null;
    price: number;
    size?: string | null;
    imageUrl?: string | null;
    tags?: readonly string[] | null;
    inStock?: boolean | null;
    featured?: boolean | null;
  }): ArtPrintDraft {
    const title = input.title.trim();
    const artist = input.artist.trim();

    if (title.length === 0) {
      throw new InvalidValueException('ArtPrint', 'title cannot be empty');
    }
    if (artist.length === 0) {
      throw new InvalidValueException('ArtPrint', 'artist cannot be empty');
    }
    if (!Number.isFinite(input.price) || input.price < 0) {
      throw new InvalidValueException('ArtPrint', 'price must be a non-negative number');
    }

    return {
      title,
      artist,
      description: input.description ?? '',
      price: input.price,
      size: input.size ?? null,
      imageUrl: input.imageUrl ?? null,
      tags: [...new Set(input.tags ?? [])],
      inStock: input.inStock ?? true,
      featured: input.featured ?? false,
    };
  }

  // Factory method: reconstitute from persistence
  static reconstitute(props: {
    id: PrintId;
    draft: ArtPrintDraft;
    createdAt?: Date | null;
    updatedAt?: Date | null;
    additionalFields?: Readonly<Record<string, unknown>>;
  }): ArtPrint {
    return new ArtPrint(
      props.id,
      props.draft,
      props.createdAt ?? null,
      props.updatedAt ?? null,
      { ...props.additionalFields },
    );
  }

  get title(): string {
    return this.props.title;
  }

  get artist(): string {
    return this.props.artist;
  }

  get description(): string {
    return this.props.description;
  }

  get price(): number {
    return this.props.price;
  }

  get size(): string | null {
    return this.props.size;
  }

  get imageUrl(): string | null {
    return this.props.imageUrl;
  }

  get tags(): readonly string[] {
    return [...this.props.tags];
  }

  get inStock(): boolean {
    return this.props.inStock;
  }

  get featured(): boolean {
    return this.props.featured;
  }

  equals(other: ArtPrint): boolean {
    return this.id.equals(other.id);
  }
}
