import { TemplateSelector } from '../../types/common/enums';
import { RenderContext } from '../../types/services/report-template';
import { averageOf, formatCurrency, formatPercent } from '../../utils/money';
import { displayDate } from '../calendar-service';
import { peakHour, topService } from '../report-service';
import { NOT_AVAILABLE, locationLabel } from './html';

/**
 * Plain-text alternative sent alongside every HTML body
 */
export const renderTextBody = (
  title: string,
  selector: TemplateSelector,
  { summary, window, currencySymbol }: RenderContext,
): string => {
  const money = (minor: number): string => formatCurrency(minor, currencySymbol);

  const payments = summary.paymentModes.map(
    (mode) =>
      `${mode.label}: ${money(mode.amount)} (${mode.count} vehicles, ${formatPercent(mode.amount, summary.totalAmount)})`,
  );
  const services = summary.services.map(
    (service) =>
      `${service.label}: ${service.count} vehicles, ${money(service.amount)} revenue (avg ${money(averageOf(service.amount, service.count))})`,
  );

  const lines = [
    `${title} - ${displayDate(window)}`,
    '',
    `Location: ${locationLabel(summary)}`,
    `Total Revenue: ${money(summary.totalAmount)}`,
    `Vehicles Served: ${summary.count}`,
    `Average Service: ${money(summary.averageAmount)}`,
    '',
    'PAYMENT BREAKDOWN:',
    ...(payments.length > 0 ? payments : [NOT_AVAILABLE]),
    '',
    'SERVICE BREAKDOWN:',
    ...(services.length > 0 ? services : [NOT_AVAILABLE]),
  ];

  if (selector === TemplateSelector.INSIGHTS) {
    const peak = peakHour(summary);
    const top = topService(summary);
    lines.push(
      '',
      'INSIGHTS:',
      `Peak Hour: ${peak ? `${peak.label} (${money(peak.amount)})` : NOT_AVAILABLE}`,
      `Top Service: ${top ? `${top.label} (${money(top.amount)})` : NOT_AVAILABLE}`,
      `Active Hours: ${summary.hourly.length}`,
    );
  }

  lines.push('', `Template Used: ${selector}`);
  return lines.join('\n') + '\n';
};
