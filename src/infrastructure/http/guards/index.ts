export { StoreAvailableGuard } from './store-available.guard';
