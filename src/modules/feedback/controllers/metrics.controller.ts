import { Controller, Get, Header, Req } from '@nestjs/common';
import type { Request } from 'express';
import { createLogger } from '../../../common/utils/logger';
import { PrometheusMetricsAdapter } from '../infrastructure/adapters/metrics/prometheus-metrics.adapter';

const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

/** Prometheus scrape endpoint for the webhook and submission counters. */
@Controller('internal')
export class MetricsController {
  private readonly logger = createLogger(MetricsController.name);

  constructor(private readonly metricsAdapter: PrometheusMetricsAdapter) {}

  @Get('metrics')
  @Header('Content-Type', PROMETHEUS_CONTENT_TYPE)
  scrape(@Req() request: Request): string {
    const exposition = this.metricsAdapter.renderPrometheus();

    this.logger.http('metrics_scraped', {
      event: 'metrics_scraped',
      request_id: request.requestId ?? null,
      bytes: Buffer.byteLength(exposition, 'utf8'),
    });

    return exposition;
  }
}
