export { IArtPrintRepositoryPort, ArtPrintFilter } from './art-print-repository.port';
export { IOrderRepositoryPort } from './order-repository.port';
