/**
 * Prometheus metric names.
 */
export const METRICS = {
  HTTP_REQUESTS_TOTAL: 'http_requests_total',
  HTTP_REQUEST_DURATION: 'http_request_duration_seconds',

  // Storefront
  ORDERS_TOTAL: 'storefront_orders_total',
  ORDER_VALUE: 'storefront_order_value',
  PRINTS_CREATED_TOTAL: 'storefront_prints_created_total',
} as const;
