export { ArtPrint, ArtPrintDraft } from './art-print.entity';
export { Order, OrderDraft } from './order.entity';
