import { TemplateSelector } from '../../types/common/enums';
import { RenderedReport } from '../../types/models/email';
import { RenderContext, ReportTemplate } from '../../types/services/report-template';
import { hourlyRevenueChart, imageTag, legend, serviceRevenueChart } from './chart-assets';
import {
  BASE_STYLES,
  buildSubject,
  header,
  locationTable,
  money,
  page,
  paymentTable,
  section,
  serviceTable,
  vehicleTypeTable,
} from './html';
import { renderTextBody } from './text-body';

const CARD_STYLES = `
  .cards { display: flex; gap: 16px; margin-bottom: 24px; }
  .card { flex: 1; background: #2563eb; color: #fff; padding: 20px; border-radius: 12px; text-align: center; }
  .card p { margin: 0; font-size: 14px; opacity: 0.9; }
  .card h2 { margin: 12px 0 0 0; font-size: 28px; font-weight: 800; }
`;

const card = (label: string, value: string): string =>
  `<div class="card"><p>${label}</p><h2>${value}</h2></div>`;

/**
 * Summary cards with hourly and service revenue charts
 */
export class EnhancedTemplate implements ReportTemplate {
  readonly selector = TemplateSelector.ENHANCED;
  readonly title = 'Daily Business Report';

  render(context: RenderContext): RenderedReport {
    const { summary, window, currencySymbol } = context;
    const hourly = hourlyRevenueChart(summary);
    const services = serviceRevenueChart(summary);

    const body = `
      ${header(this.title, summary, window)}
      <div class="cards">
        ${card('Total Revenue', money(summary.totalAmount, currencySymbol))}
        ${card('Vehicles Served', String(summary.count))}
        ${card('Average Service', money(summary.averageAmount, currencySymbol))}
      </div>
      ${locationTable(summary, currencySymbol)}
      ${section('Hourly Performance', imageTag(hourly, 'Revenue by hour'))}
      ${section(
        'Service Performance',
        `${imageTag(services, 'Revenue by service')}${legend(summary.services, currencySymbol)}${serviceTable(summary, currencySymbol)}`,
      )}
      ${section('Payment Breakdown', paymentTable(summary, currencySymbol))}
      ${section('Vehicle Distribution', vehicleTypeTable(summary))}`;

    return {
      subject: buildSubject('Daily Report', summary, window),
      html: page(this.title, BASE_STYLES + CARD_STYLES, body),
      text: renderTextBody(this.title, this.selector, context),
      assets: [hourly, services],
    };
  }
}
