import { Either } from '@application/common';
import { ApplicationError } from '@application/errors';
import { CreateOrderInputDto, CreatedOrderOutputDto, OrderOutputDto } from '@application/dtos';

export interface ICreateOrderPort {
  /**
   * Validate the requested items against the catalog, price them and
   * persist a pending order.
   *
   * Fails without persisting anything when the list is empty, a print is
   * missing, or a print is out of stock.
   *
   * @returns Either an error or the stored order with its resolved lines
   */
  execute(input: CreateOrderInputDto): Promise<Either<ApplicationError, CreatedOrderOutputDto>>;

  /**
   * Get an order by ID.
   *
   * @returns Either an error or the order's public representation
   */
  getOrder(orderId: string): Promise<Either<ApplicationError, OrderOutputDto>>;
}
