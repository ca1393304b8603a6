import { Either } from '@application/common';
import { ApplicationError } from '@application/errors';
import { ArtPrintOutputDto, CreatePrintInputDto, ListPrintsInputDto } from '@application/dtos';

export interface ICatalogPort {
  /**
   * List prints, optionally only featured or non-featured ones.
   */
  listPrints(input: ListPrintsInputDto): Promise<Either<ApplicationError, ArtPrintOutputDto[]>>;

  /**
   * Get one print by ID.
   */
  getPrint(printId: string): Promise<Either<ApplicationError, ArtPrintOutputDto>>;

  /**
   * Add a print to the catalog.
   */
  createPrint(input: CreatePrintInputDto): Promise<Either<ApplicationError, ArtPrintOutputDto>>;
}
