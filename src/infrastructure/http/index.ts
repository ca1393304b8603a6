export { HttpModule } from './http.module';
export * from './controllers';
export * from './dtos/request';
export * from './errors';
export * from './guards';
export * from './pipes';
