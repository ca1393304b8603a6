import { Controller, Get, Logger } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { InjectConnection } from '@nestjs/mongoose';
import { Connection, ConnectionStates } from 'mongoose';
import { EnvConfigService } from '@infrastructure/config';

const MAX_LISTED_COLLECTIONS = 10;
const MAX_ERROR_LENGTH = 50;

export interface StoreDiagnostics {
  backend: string;
  database: string;
  database_url: 'Set' | 'Not Set';
  database_name: string | null;
  connection_status: 'Connected' | 'Not Connected';
  collections: string[];
}

/**
 * Liveness, readiness and store diagnostics.
 * None of these routes sit behind the store guard, so they answer
 * while the database is down.
 */
@ApiTags('Health')
@Controller()
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    private readonly envConfig: EnvConfigService,
    @InjectConnection() private readonly mongoConnection: Connection,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Service banner' })
  @ApiResponse({ status: 200, description: 'API is running' })
  root(): { message: string } {
    return { message: 'Art Prints API running' };
  }

  /**
   * Store diagnostics. `database_url` only says whether a URL is configured.
   * Failures are described in the body; this route never errors.
   */
  @Get('test')
  @ApiOperation({
    summary: 'Store diagnostics',
    description: 'Connection status, database name and collection names.',
  })
  @ApiResponse({ status: 200, description: 'Diagnostics report' })
  async diagnostics(): Promise<StoreDiagnostics> {
    const report: StoreDiagnostics = {
      backend: 'Running',
      database: 'Not Available',
      database_url: this.envConfig.databaseUrl ? 'Set' : 'Not Set',
      database_name: null,
      connection_status: 'Not Connected',
      collections: [],
    };

    if (!this.isConnected()) {
      return report;
    }

    report.database = 'Available';
    report.database_name = this.mongoConnection.name || 'Unknown';
    report.connection_status = 'Connected';

    try {
      const db = this.mongoConnection.db;
      const collections = db ? await db.listCollections({}, { nameOnly: true }).toArray() : [];
      report.collections = collections
        .map((collection) => collection.name)
        .slice(0, MAX_LISTED_COLLECTIONS);
      report.database = 'Connected & Working';
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Listing collections failed: ${detail}`);
      report.database = `Connected but Error: ${detail.slice(0, MAX_ERROR_LENGTH)}`;
    }

    return report;
  }

  /**
   * Liveness check for container orchestration.
   */
  @Get('health/live')
  @ApiOperation({ summary: 'Liveness check' })
  @ApiResponse({ status: 200, description: 'Application is alive' })
  live(): { status: string } {
    return { status: 'alive' };
  }

  /**
   * Readiness check: the store must answer a ping.
   */
  @Get('health/ready')
  @ApiOperation({ summary: 'Readiness check' })
  @ApiResponse({ status: 200, description: 'Readiness status' })
  async ready(): Promise<{ status: string; reason?: string }> {
    if (!(await this.pingStore())) {
      return {
        status: 'not_ready',
        reason: 'MongoDB is not available',
      };
    }

    return { status: 'ready' };
  }

  private isConnected(): boolean {
    return this.mongoConnection.readyState === ConnectionStates.connected;
  }

  private async pingStore(): Promise<boolean> {
    if (!this.isConnected()) {
      return false;
    }

    try {
      await this.mongoConnection.db?.admin().ping();
      return true;
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Store ping failed: ${detail}`);
      return false;
    }
  }
}
