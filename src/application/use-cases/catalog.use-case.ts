import { Inject, Injectable } from '@nestjs/common';
import { Either, left, right, tryCatchAsync } from '../common/either';
import { ArtPrintOutputDto, CreatePrintInputDto, ListPrintsInputDto } from '../dtos/art-print.dto';
import {
  ApplicationError,
  PersistenceError,
  PrintNotFoundError,
  UnexpectedError,
  ValidationError,
} from '@application/errors';
import { ArtPrint, ArtPrintDraft } from '@domain/entities';
import { DomainException } from '@domain/exceptions';
import { PrintId } from '@domain/value-objects';
import { ArtPrintFilter, IArtPrintRepositoryPort } from '../ports';
import { ICatalogPort } from '@application/ports/inbound/catalog.port';

/**
 * CatalogUseCase covers browsing and adding art prints.
 */
@Injectable()
export class CatalogUseCase implements ICatalogPort {
  constructor(
    @Inject('IArtPrintRepository')
    private readonly artPrintRepository: IArtPrintRepositoryPort,
  ) {}

  async listPrints(
    input: ListPrintsInputDto,
  ): Promise<Either<ApplicationError, ArtPrintOutputDto[]>> {
    const filter: ArtPrintFilter = input.featured === undefined ? {} : { featured: input.featured };

    const result = await tryCatchAsync(
      () => this.artPrintRepository.findAll(filter),
      (error) => new UnexpectedError(error instanceof Error ? error.message : 'Unknown error'),
    );

    return result.map((prints) => prints.map((print) => this.mapToOutput(print)));
  }

  async getPrint(printId: string): Promise<Either<ApplicationError, ArtPrintOutputDto>> {
    try {
      if (!PrintId.isValid(printId)) {
        return left(new PrintNotFoundError(printId));
      }

      const print = await this.artPrintRepository.findById(PrintId.fromString(printId));
      if (!print) {
        return left(new PrintNotFoundError(printId));
      }

      return right(this.mapToOutput(print));
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      return left(new UnexpectedError(message));
    }
  }

  async createPrint(
    input: CreatePrintInputDto,
  ): Promise<Either<ApplicationError, ArtPrintOutputDto>> {
    let draft: ArtPrintDraft;
    try {
      draft = ArtPrint.draft(input);
    } catch (error) {
      if (error instanceof DomainException) {
        return left(new ValidationError(error.message));
      }
      throw error;
    }

    const created = await tryCatchAsync(
      () => this.artPrintRepository.create(draft),
      PersistenceError.fromUnknown,
    );

    return created.map((print) => this.mapToOutput(print));
  }

  private mapToOutput(print: ArtPrint): ArtPrintOutputDto {
    return {
      ...print.additionalFields,
      id: print.id.toString(),
      title: print.title,
      artist: print.artist,
      description: print.description,
      price: print.price,
      size: print.size,
      image_url: print.imageUrl,
      tags: [...print.tags],
      in_stock: print.inStock,
      featured: print.featured,
      created_at: print.createdAt?.toISOString() ?? null,
      updated_at: print.updatedAt?.toISOString() ?? null,
    };
  }
}
