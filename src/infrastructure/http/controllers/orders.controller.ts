import { Body, Controller, Get, Inject, Logger, Param, Post, UseGuards } from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiNotFoundResponse,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiServiceUnavailableResponse,
  ApiTags,
} from '@nestjs/swagger';
import { CreatedOrderOutputDto, OrderOutputDto } from '@application/dtos';
import { ICreateOrderPort } from '@application/ports/inbound';
import { AppLoggerService } from '@infrastructure/observability/logging';
import { MetricsService } from '@infrastructure/observability/metrics';
import { CreateOrderRequestDto } from '../dtos/request';
import { toHttpException } from '../errors';
import { StoreAvailableGuard } from '../guards';

const ORDER_PROPERTIES = {
  id: { type: 'string', example: '665f1d07b1d4e83f9c0a1b31' },
  customer_name: { type: 'string', example: 'Jane Doe' },
  customer_email: { type: 'string', example: 'jane@example.com' },
  shipping_address: { type: 'string' },
  items: {
    type: 'array',
    items: {
      type: 'object',
      properties: {
        print_id: { type: 'string' },
        quantity: { type: 'number', example: 2 },
      },
    },
  },
  total: { type: 'number', example: 98 },
  status: { type: 'string', example: 'pending' },
  created_at: { type: 'string', format: 'date-time', nullable: true },
  updated_at: { type: 'string', format: 'date-time', nullable: true },
};

/**
 * Order endpoints. Prices and totals always come from the catalog.
 */
@ApiTags('Orders')
@UseGuards(StoreAvailableGuard)
@ApiServiceUnavailableResponse({ description: 'Store unavailable' })
@Controller('api/orders')
export class OrdersController {
  private readonly logger = new Logger(OrdersController.name);

  constructor(
    @Inject('CreateOrderUseCase')
    private readonly createOrderUseCase: ICreateOrderPort,
    private readonly appLogger: AppLoggerService,
    private readonly metricsService: MetricsService,
  ) {}

  /**
   * Place an order.
   *
   * Every item is checked against the catalog (exists, in stock) and
   * priced from it before the order is stored as `pending`.
   */
  @Post()
  @ApiOperation({
    summary: 'Create an order',
    description:
      'Validates items against the catalog, computes the total server side and stores a pending order.',
  })
  @ApiResponse({
    status: 201,
    description: 'Order created',
    schema: {
      type: 'object',
      properties: {
        ...ORDER_PROPERTIES,
        items_detailed: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              print_id: { type: 'string' },
              title: { type: 'string', example: 'Sunlit Dunes' },
              price: { type: 'number', example: 49 },
              quantity: { type: 'number', example: 2 },
            },
          },
        },
      },
    },
  })
  @ApiBadRequestResponse({ description: 'Empty order, out-of-stock print or store failure' })
  @ApiNotFoundResponse({ description: 'Unknown print' })
  async createOrder(@Body() dto: CreateOrderRequestDto): Promise<CreatedOrderOutputDto> {
    this.logger.debug(`Creating order with ${dto.items.length} item(s)`);

    const result = await this.createOrderUseCase.execute({
      customerName: dto.customer_name,
      customerEmail: dto.customer_email,
      shippingAddress: dto.shipping_address,
      items: dto.items.map((item) => ({ printId: item.print_id, quantity: item.quantity })),
    });

    if (result.isLeft()) {
      const error = result.value;
      this.metricsService.recordOrder(error.statusCode < 500 ? 'rejected' : 'failed');
      this.appLogger.logOrderEvent({
        event: 'rejected',
        itemCount: dto.items.length,
        reason: error.message,
      });
      throw toHttpException(error);
    }

    const order = result.value;
    this.metricsService.recordOrder('created');
    this.metricsService.recordOrderValue(order.total);
    this.appLogger.logOrderEvent({
      event: 'created',
      orderId: order.id,
      itemCount: order.items.length,
      total: order.total,
    });

    return order;
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get order by ID' })
  @ApiParam({ name: 'id', description: 'Order ID', example: '665f1d07b1d4e83f9c0a1b31' })
  @ApiResponse({
    status: 200,
    description: 'Order found',
    schema: { type: 'object', properties: ORDER_PROPERTIES },
  })
  @ApiNotFoundResponse({ description: 'Order not found' })
  async getOrderById(@Param('id') id: string): Promise<OrderOutputDto> {
    this.logger.debug(`Getting order by ID: ${id}`);

    const result = await this.createOrderUseCase.getOrder(id);

    if (result.isLeft()) {
      throw toHttpException(result.value);
    }

    return result.value;
  }
}
