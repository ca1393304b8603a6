import {
  Body,
  Controller,
  Get,
  Inject,
  Logger,
  Param,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiNotFoundResponse,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiServiceUnavailableResponse,
  ApiTags,
} from '@nestjs/swagger';
import { ArtPrintOutputDto } from '@application/dtos';
import { ICatalogPort } from '@application/ports/inbound';
import { AppLoggerService } from '@infrastructure/observability/logging';
import { MetricsService } from '@infrastructure/observability/metrics';
import { CreatePrintRequestDto, ListPrintsQueryDto } from '../dtos/request';
import { toHttpException } from '../errors';
import { StoreAvailableGuard } from '../guards';

const ART_PRINT_SCHEMA = {
  type: 'object',
  properties: {
    id: { type: 'string', example: '665f1c2ab1d4e83f9c0a1b2c' },
    title: { type: 'string', example: 'Sunlit Dunes' },
    artist: { type: 'string', example: 'Ava Linden' },
    description: { type: 'string' },
    price: { type: 'number', example: 49 },
    size: { type: 'string', nullable: true, example: '12x18 in' },
    image_url: { type: 'string', nullable: true },
    tags: { type: 'array', items: { type: 'string' } },
    in_stock: { type: 'boolean' },
    featured: { type: 'boolean' },
    created_at: { type: 'string', format: 'date-time', nullable: true },
    updated_at: { type: 'string', format: 'date-time', nullable: true },
  },
};

/**
 * Catalog endpoints.
 */
@ApiTags('Prints')
@UseGuards(StoreAvailableGuard)
@ApiServiceUnavailableResponse({ description: 'Store unavailable' })
@Controller('api/prints')
export class PrintsController {
  private readonly logger = new Logger(PrintsController.name);

  constructor(
    @Inject('CatalogUseCase')
    private readonly catalog: ICatalogPort,
    private readonly appLogger: AppLoggerService,
    private readonly metricsService: MetricsService,
  ) {}

  @Get()
  @ApiOperation({
    summary: 'List prints',
    description: 'All prints, or only those whose featured flag matches the query.',
  })
  @ApiResponse({
    status: 200,
    description: 'Catalog prints',
    schema: { type: 'array', items: ART_PRINT_SCHEMA },
  })
  async listPrints(@Query() query: ListPrintsQueryDto): Promise<ArtPrintOutputDto[]> {
    this.logger.debug(`Listing prints: featured=${String(query.featured ?? 'any')}`);

    const result = await this.catalog.listPrints({ featured: query.featured });

    if (result.isLeft()) {
      throw toHttpException(result.value);
    }

    return result.value;
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get print by ID' })
  @ApiParam({ name: 'id', description: 'Print ID', example: '665f1c2ab1d4e83f9c0a1b2c' })
  @ApiResponse({ status: 200, description: 'Print found', schema: ART_PRINT_SCHEMA })
  @ApiNotFoundResponse({ description: 'Print not found' })
  async getPrint(@Param('id') id: string): Promise<ArtPrintOutputDto> {
    const result = await this.catalog.getPrint(id);

    if (result.isLeft()) {
      this.logger.debug(`Print lookup failed: ${result.value.message}`);
      throw toHttpException(result.value);
    }

    return result.value;
  }

  @Post()
  @ApiOperation({
    summary: 'Create a print',
    description: 'Adds a print to the catalog and returns the stored document.',
  })
  @ApiResponse({ status: 201, description: 'Print created', schema: ART_PRINT_SCHEMA })
  @ApiBadRequestResponse({ description: 'Invalid body or store failure' })
  async createPrint(@Body() dto: CreatePrintRequestDto): Promise<ArtPrintOutputDto> {
    const result = await this.catalog.createPrint({
      title: dto.title,
      artist: dto.artist,
      description: dto.description,
      price: dto.price,
      size: dto.size,
      imageUrl: dto.image_url,
      tags: dto.tags,
      inStock: dto.in_stock,
      featured: dto.featured,
    });

    if (result.isLeft()) {
      this.logger.warn(`Print creation failed: ${result.value.message}`);
      throw toHttpException(result.value);
    }

    this.metricsService.recordPrintCreated();
    this.appLogger.logCatalogEvent({
      event: 'print_created',
      printId: result.value.id,
      title: result.value.title,
    });

    return result.value;
  }
}
