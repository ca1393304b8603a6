import { ApiProperty } from '@nestjs/swagger';
import {
  IsArray,
  IsEmail,
  IsInt,
  IsNotEmpty,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';

export class OrderItemRequestDto {
  @ApiProperty({ description: 'Catalog id of the print', example: '665f1c2ab1d4e83f9c0a1b2c' })
  @IsString({ message: 'print_id must be a string' })
  @IsNotEmpty({ message: 'print_id cannot be empty' })
  print_id!: string;

  @ApiProperty({ example: 1, minimum: 1 })
  @IsInt({ message: 'quantity must be a whole number' })
  @Min(1, { message: 'quantity must be at least 1' })
  quantity!: number;
}

/**
 * Request body for placing an order.
 *
 * Clients send only print references and quantities; titles, prices and
 * the total are resolved server side. An empty `items` array passes
 * validation here and is rejected by the order use case.
 */
export class CreateOrderRequestDto {
  @ApiProperty({ example: 'Jane Doe' })
  @IsString()
  @IsNotEmpty({ message: 'customer_name cannot be empty' })
  customer_name!: string;

  @ApiProperty({ example: 'jane@example.com' })
  @IsEmail({}, { message: 'customer_email must be a valid email address' })
  customer_email!: string;

  @ApiProperty({ example: '1 Main St, Springfield' })
  @IsString()
  @IsNotEmpty({ message: 'shipping_address cannot be empty' })
  shipping_address!: string;

  @ApiProperty({ type: [OrderItemRequestDto] })
  @IsArray({ message: 'items must be an array' })
  @ValidateNested({ each: true })
  @Type(() => OrderItemRequestDto)
  items!: OrderItemRequestDto[];
}
