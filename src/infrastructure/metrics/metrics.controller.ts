import { Controller, Get, Res } from '@nestjs/common';
import type { Response } from 'express';
import { getRegistry } from './prom';

@Controller()
export class MetricsController {
  @Get('/metrics')
  async metrics(@Res({ passthrough: true }) res: Response): Promise<string> {
    const registry = getRegistry();
    res.setHeader('Content-Type', registry.contentType);
    return registry.metrics();
  }
}
