export { MongoArtPrintRepository } from './mongo-art-print.repository';
export { MongoOrderRepository } from './mongo-order.repository';
