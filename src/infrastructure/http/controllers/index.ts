export { HealthController, StoreDiagnostics } from './health.controller';
export { OrdersController } from './orders.controller';
export { PrintsController } from './prints.controller';
