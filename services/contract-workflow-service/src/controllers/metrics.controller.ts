import { Controller, Get, Header } from '@nestjs/common';
import { Registry } from 'prom-client';
import { WorkflowMetrics } from '../metrics/workflow-metrics';

@Controller()
export class MetricsController {
  constructor(private readonly metrics: WorkflowMetrics) {}

  @Get('/metrics')
  @Header('Content-Type', Registry.PROMETHEUS_CONTENT_TYPE)
  prometheus(): Promise<string> {
    return this.metrics.metrics();
  }
}
