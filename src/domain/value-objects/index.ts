export { PrintId } from './print-id.vo';
export { OrderId } from './order-id.vo';
export { OrderStatus } from './order-status.vo';
export { OrderItem } from './order-item.vo';
export { OrderLine } from './order-line.vo';
