import { AnalyticsDatabase } from './database';
import { describeError } from './errors';

export interface HealthCheck {
  status: 'healthy' | 'unhealthy' | 'warning';
  responseTime?: string;
  details?: string;
  error?: string;
}

export interface ServiceHealth {
  service: string;
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  version: string;
  environment: string;
  pid: number;
  checks: {
    database?: HealthCheck;
    tables?: HealthCheck;
    memory?: HealthCheck;
  };
}

export class HealthChecker {
  constructor(
    private readonly serviceName: string,
    private readonly database: AnalyticsDatabase,
    private readonly expectedTables: readonly string[] = []
  ) {}

  async performHealthCheck(): Promise<ServiceHealth> {
    const checks: ServiceHealth['checks'] = {};
    let overallHealthy = true;

    // Database health check
    const dbStart = Date.now();
    const dbHealthy = this.database.isOpen && (await this.database.healthCheck());
    checks.database = {
      status: dbHealthy ? 'healthy' : 'unhealthy',
      responseTime: `${Date.now() - dbStart}ms`,
      details: dbHealthy ? 'Connection successful' : 'Connection failed',
    };
    if (!dbHealthy) overallHealthy = false;

    // Published tables: missing ones degrade the dashboard but do not make the service unhealthy
    if (dbHealthy && this.expectedTables.length > 0) {
      try {
        const missing: string[] = [];
        for (const table of this.expectedTables) {
          if (!(await this.database.tableExists(table))) {
            missing.push(table);
          }
        }
        checks.tables = {
          status: missing.length === 0 ? 'healthy' : 'warning',
          details: missing.length === 0 ? 'All tables published' : `Missing: ${missing.join(', ')}`,
        };
      } catch (error) {
        checks.tables = { status: 'unhealthy', error: describeError(error) };
        overallHealthy = false;
      }
    }

    // Memory health check
    const memUsage = process.memoryUsage();
    const memoryUsedMB = Math.round(memUsage.heapUsed / 1024 / 1024);
    const memoryTotalMB = Math.round(memUsage.heapTotal / 1024 / 1024);
    const memoryUsagePercent = Math.round((memUsage.heapUsed / memUsage.heapTotal) * 100);

    checks.memory = {
      status: memoryUsagePercent > 90 ? 'warning' : 'healthy',
      details: `${memoryUsedMB}MB / ${memoryTotalMB}MB (${memoryUsagePercent}%)`,
    };

    return {
      service: this.serviceName,
      status: overallHealthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      version: process.env.npm_package_version || '1.0.0',
      environment: process.env.NODE_ENV || 'development',
      pid: process.pid,
      checks,
    };
  }

  checkLiveness(): { status: 'alive'; uptime: number; pid: number } {
    return {
      status: 'alive',
      uptime: process.uptime(),
      pid: process.pid,
    };
  }
}
