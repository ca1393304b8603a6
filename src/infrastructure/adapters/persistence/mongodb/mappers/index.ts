export { ArtPrintMapper, artPrintRecordSchema, ArtPrintRecord } from './art-print.mapper';
export { OrderMapper, orderRecordSchema, OrderRecord } from './order.mapper';
