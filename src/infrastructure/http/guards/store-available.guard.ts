import { CanActivate, Injectable } from '@nestjs/common';
import { InjectConnection } from '@nestjs/mongoose';
import { Connection, ConnectionStates } from 'mongoose';
import { StoreUnavailableError } from '@application/errors';
import { toHttpException } from '../errors';

/**
 * Rejects storefront requests with 503 while the store connection is down.
 */
@Injectable()
export class StoreAvailableGuard implements CanActivate {
  constructor(@InjectConnection() private readonly connection: Connection) {}

  canActivate(): boolean {
    if (this.connection.readyState !== ConnectionStates.connected) {
      throw toHttpException(new StoreUnavailableError());
    }
    return true;
  }
}
