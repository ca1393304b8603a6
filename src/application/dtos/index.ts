export * from './order.dto';
export * from './art-print.dto';
