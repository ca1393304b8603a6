export { OrderPricingService, roundHalfEven } from './order-pricing.service';
