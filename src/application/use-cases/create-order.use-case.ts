import { Inject, Injectable } from '@nestjs/common';
import { Either, left, right, tryCatchAsync } from '../common/either';
import {
  CreatedOrderOutputDto,
  CreateOrderInputDto,
  OrderLineOutputDto,
  OrderOutputDto,
} from '../dtos/order.dto';
import {
  ApplicationError,
  EmptyOrderError,
  OrderNotFoundError,
  PersistenceError,
  PrintNotFoundError,
  PrintOutOfStockError,
  UnexpectedError,
  ValidationError,
} from '@application/errors';
import { ArtPrint, Order } from '@domain/entities';
import { OrderPricingService } from '@domain/services';
import { OrderId, OrderItem, OrderLine, PrintId } from '@domain/value-objects';
import { IArtPrintRepositoryPort, IOrderRepositoryPort } from '../ports';
import { ICreateOrderPort } from '@application/ports/inbound/create-order.port';

/**
 * CreateOrderUseCase places orders priced from the catalog.
 *
 * The client only says which prints and how many. Titles and prices are
 * re-read from the store for every line, so a tampered request cannot
 * change what gets charged:
 * - Empty orders are rejected
 * - Every referenced print must exist and be in stock
 * - The total is the sum of current price * quantity, rounded to cents
 *
 * All validation happens before the single insert, so a failed request
 * never leaves a partial order behind. Stock is checked, not reserved.
 */
@Injectable()
export class CreateOrderUseCase implements ICreateOrderPort {
  private readonly pricing = new OrderPricingService();

  constructor(
    @Inject('IArtPrintRepository')
    private readonly artPrintRepository: IArtPrintRepositoryPort,
    @Inject('IOrderRepository')
    private readonly orderRepository: IOrderRepositoryPort,
  ) {}

  async execute(
    input: CreateOrderInputDto,
  ): Promise<Either<ApplicationError, CreatedOrderOutputDto>> {
    try {
      const invalid = this.validateInput(input);
      if (invalid) {
        return left(invalid);
      }

      // Resolve every line against the catalog, in request order
      const lines: OrderLine[] = [];
      for (const requested of input.items) {
        const print = await this.findPrint(requested.printId);
        if (!print) {
          return left(new PrintNotFoundError(requested.printId));
        }

        if (!print.inStock) {
          return left(new PrintOutOfStockError(print.title));
        }

        const item = OrderItem.create({ printId: print.id, quantity: requested.quantity });
        lines.push(this.pricing.priceItem(item, print));
      }

      const draft = Order.draft({
        customerName: input.customerName,
        customerEmail: input.customerEmail,
        shippingAddress: input.shippingAddress,
        items: lines.map((line) => line.toItem()),
        total: this.pricing.total(lines),
      });

      const persisted = await tryCatchAsync(
        () => this.orderRepository.create(draft),
        PersistenceError.fromUnknown,
      );
      if (persisted.isLeft()) {
        return left(persisted.value);
      }

      return right({
        ...this.mapToOutput(persisted.value),
        items_detailed: lines.map((line) => this.mapLineToOutput(line)),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      return left(new UnexpectedError(message));
    }
  }

  async getOrder(orderId: string): Promise<Either<ApplicationError, OrderOutputDto>> {
    try {
      if (!OrderId.isValid(orderId)) {
        return left(new OrderNotFoundError(orderId));
      }

      const order = await this.orderRepository.findById(OrderId.fromString(orderId));
      if (!order) {
        return left(new OrderNotFoundError(orderId));
      }

      return right(this.mapToOutput(order));
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      return left(new UnexpectedError(message));
    }
  }

  // ============ Private Helper Methods ============

  private validateInput(input: CreateOrderInputDto): ApplicationError | null {
    if (input.items.length === 0) {
      return new EmptyOrderError();
    }

    const badQuantity = input.items.find(
      (item) => !Number.isInteger(item.quantity) || item.quantity < 1,
    );
    if (badQuantity) {
      return new ValidationError(
        `Quantity must be a positive whole number (print ${badQuantity.printId})`,
        'quantity',
      );
    }

    return null;
  }

  /**
   * A malformed id cannot match anything, so it reads as "not found".
   * Store failures are not masked and surface as unexpected errors.
   */
  private async findPrint(printId: string): Promise<ArtPrint | null> {
    if (!PrintId.isValid(printId)) {
      return null;
    }

    return this.artPrintRepository.findById(PrintId.fromString(printId));
  }

  private mapLineToOutput(line: OrderLine): OrderLineOutputDto {
    return {
      print_id: line.printId.toString(),
      title: line.title,
      price: line.price,
      quantity: line.quantity,
    };
  }

  private mapToOutput(order: Order): OrderOutputDto {
    return {
      ...order.additionalFields,
      id: order.id.toString(),
      customer_name: order.customerName,
      customer_email: order.customerEmail,
      shipping_address: order.shippingAddress,
      items: order.items.map((item) => ({
        print_id: item.printId.toString(),
        quantity: item.quantity,
      })),
      total: order.total,
      status: order.status.toString(),
      created_at: order.createdAt?.toISOString() ?? null,
      updated_at: order.updatedAt?.toISOString() ?? null,
    };
  }
}
