import { TemplateSelector } from '../../types/common/enums';
import { RenderedReport } from '../../types/models/email';
import { RenderContext, ReportTemplate } from '../../types/services/report-template';
import {
  BASE_STYLES,
  buildSubject,
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

/**
 * Tables only, no inline images
 */
export class ClassicTemplate implements ReportTemplate {
  readonly selector = TemplateSelector.CLASSIC;
  readonly title = 'Daily Business Report';

  render(context: RenderContext): RenderedReport {
    const { summary, window, currencySymbol } = context;

    const body = `
      ${header(this.title, summary, window)}
      ${section(
        'Summary',
        `<table>
          <tr><th>Total Revenue</th><td>${money(summary.totalAmount, currencySymbol)}</td></tr>
          <tr><th>Vehicles Served</th><td>${summary.count}</td></tr>
          <tr><th>Average Service</th><td>${money(summary.averageAmount, currencySymbol)}</td></tr>
        </table>`,
      )}
      ${locationTable(summary, currencySymbol)}
      ${section('Payment Mode Breakdown', paymentTable(summary, currencySymbol))}
      ${section('Service Breakdown', serviceTable(summary, currencySymbol))}
      ${section('Vehicle Type Distribution', vehicleTypeTable(summary))}
      ${section('Hourly Performance', hourlyTable(summary.hourly, currencySymbol))}`;

    return {
      subject: buildSubject('Daily Report', summary, window),
      html: page(this.title, BASE_STYLES, body),
      text: renderTextBody(this.title, this.selector, context),
      assets: [],
    };
  }
}
