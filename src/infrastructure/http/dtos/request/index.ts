export { CreateOrderRequestDto, OrderItemRequestDto } from './create-order.dto';
export { CreatePrintRequestDto } from './create-print.dto';
export { ListPrintsQueryDto, parseBooleanFlag } from './list-prints.dto';
