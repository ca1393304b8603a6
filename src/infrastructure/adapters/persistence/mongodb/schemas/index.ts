export {
  ArtPrintDocument,
  ArtPrintDocumentType,
  ArtPrintSchema,
} from './art-print.schema';

export {
  OrderDocument,
  OrderDocumentType,
  OrderSchema,
  OrderItemDocument,
  OrderItemSchema,
} from './order.schema';
