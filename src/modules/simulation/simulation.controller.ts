import { Controller, Get, HttpStatus, Inject, Logger, Param, Post, Res } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { JsonReply } from '../../common/http/json-reply';
import { DomainDefinition, SimulationCommand } from './definitions';
import { MetricsEngine } from './metrics.engine';
import { DOMAIN_DEFINITION } from './simulation.constants';

/**
 * Endpoints every analytics service exposes: a liveness ping that also
 * produces activity, and on-demand simulation of a named activity.
 */
@ApiTags('simulation')
@Controller('api')
export class SimulationController {
  private readonly logger = new Logger(SimulationController.name);

  constructor(
    @Inject(DOMAIN_DEFINITION) private readonly definition: DomainDefinition,
    private readonly engine: MetricsEngine,
  ) {}

  @Get('health-check')
  @ApiOperation({ summary: 'Service health ping', description: 'Runs the service health activity once' })
  @ApiResponse({ status: 200, description: 'Service is healthy' })
  healthCheck() {
    this.engine.run(this.definition.healthActivity);
    return {
      status: 'healthy',
      service: this.definition.service,
      timestamp: new Date().toISOString(),
      uptime: 'running',
    };
  }

  /**
   * Runs the activities behind a simulation type
   *
   * @param type - Case-insensitive alias such as `orders` or `logins`, or `all`
   */
  @Post('simulate/:type')
  @ApiOperation({ summary: 'Simulate activity', description: 'Runs one activity kind, or all of them' })
  @ApiParam({ name: 'type', description: 'Simulation type' })
  @ApiResponse({ status: 200, description: 'Activity simulated' })
  @ApiResponse({ status: 400, description: 'Unknown simulation type' })
  simulate(@Param('type') type: string, @Res() reply: JsonReply) {
    const command = this.findCommand(type);
    if (!command) {
      return reply.status(HttpStatus.BAD_REQUEST).json({ error: 'Unknown simulation type' });
    }

    const kinds = command.kinds.length > 0 ? command.kinds : this.engine.kinds();
    for (const kind of kinds) {
      this.engine.run(kind);
    }

    this.logger.log(`Simulated ${this.definition.service} activity: ${type}`);
    return reply.status(HttpStatus.OK).json({
      message: command.message,
      type,
      service: this.definition.service,
      timestamp: new Date().toISOString(),
    });
  }

  private findCommand(type: string): SimulationCommand | undefined {
    const key = type.toLowerCase();
    return Object.prototype.hasOwnProperty.call(this.definition.commands, key)
      ? this.definition.commands[key]
      : undefined;
  }
}
