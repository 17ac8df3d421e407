import { TemplateSelector } from '../../types/common/enums';
import { RenderedReport } from '../../types/models/email';
import { RenderContext, ReportTemplate } from '../../types/services/report-template';
import { peakHour, topService } from '../report-service';
import {
  hourlyRevenueChart,
  imageTag,
  legend,
  paymentMixChart,
  serviceRevenueChart,
} from './chart-assets';
import {
  BASE_STYLES,
  NOT_AVAILABLE,
  buildSubject,
  display,
  header,
  hourlyTable,
  locationTable,
  money,
  page,
  paymentTable,
  section,
  serviceTable,
  vehicleTypeTable,
} from './html';
import { renderTextBody } from './text-body';

const TILE_STYLES = `
  .tiles { display: flex; flex-wrap: wrap; gap: 12px; margin-bottom: 24px; }
  .tile { flex: 1 1 160px; border: 1px solid #e2e8f0; border-radius: 10px; padding: 16px; }
  .tile .label { color: #64748b; font-size: 12px; text-transform: uppercase; letter-spacing: 0.5px; }
  .tile .value { color: #1a1a1a; font-size: 22px; font-weight: 800; }
  .tile .hint { color: #64748b; font-size: 13px; }
`;

const tile = (label: string, value: string, hint?: string): string => `
  <div class="tile">
    <div class="label">${label}</div>
    <div class="value">${value}</div>
    ${hint ? `<div class="hint">${hint}</div>` : ''}
  </div>`;

/**
 * Business intelligence layout: insight tiles and three charts
 */
export class InsightsTemplate implements ReportTemplate {
  readonly selector = TemplateSelector.INSIGHTS;
  readonly title = 'Business Intelligence Report';

  render(context: RenderContext): RenderedReport {
    const { summary, window, currencySymbol } = context;
    const hourly = hourlyRevenueChart(summary);
    const payments = paymentMixChart(summary);
    const services = serviceRevenueChart(summary);
    const peak = peakHour(summary);
    const top = topService(summary);

    const body = `
      ${header(this.title, summary, window)}
      <div class="tiles">
        ${tile('Revenue', money(summary.totalAmount, currencySymbol))}
        ${tile('Transactions', String(summary.count))}
        ${tile('Average Transaction', money(summary.averageAmount, currencySymbol))}
        ${tile('Peak Hour', peak ? peak.label : NOT_AVAILABLE, peak ? money(peak.amount, currencySymbol) : undefined)}
        ${tile('Top Service', display(top?.label), top ? money(top.amount, currencySymbol) : undefined)}
        ${tile('Active Hours', String(summary.hourly.length))}
      </div>
      ${locationTable(summary, currencySymbol)}
      ${section('Revenue by Hour', `${imageTag(hourly, 'Revenue by hour')}${hourlyTable(summary.hourly, currencySymbol)}`)}
      ${section(
        'Payment Mix',
        `${imageTag(payments, 'Payment mix')}${legend(summary.paymentModes, currencySymbol)}${paymentTable(summary, currencySymbol)}`,
      )}
      ${section(
        'Service Performance',
        `${imageTag(services, 'Revenue by service')}${legend(summary.services, currencySymbol)}${serviceTable(summary, currencySymbol)}`,
      )}
      ${section('Vehicle Distribution', vehicleTypeTable(summary))}`;

    return {
      subject: buildSubject(this.title, summary, window),
      html: page(this.title, BASE_STYLES + TILE_STYLES, body),
      text: renderTextBody(this.title, this.selector, context),
      assets: [hourly, payments, services],
    };
  }
}
