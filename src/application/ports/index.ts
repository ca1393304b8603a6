export * from './inbound';
export * from './outbound';
