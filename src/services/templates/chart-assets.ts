import { InlineAsset } from '../../types/models/email';
import { BreakdownEntry, ReportAggregate } from '../../types/models/report';
import { formatCurrency } from '../../utils/money';
import { colorAt, renderBarChart, renderColumnChart, renderShareBar, toHex } from './charts';
import { escapeHtml } from './html';

export const CHART_IDS = {
  hourly: 'hourly-revenue@daily-report',
  services: 'service-revenue@daily-report',
  payments: 'payment-mix@daily-report',
} as const;

const pngAsset = (contentId: string, filename: string, content: Buffer): InlineAsset => ({
  contentId,
  filename,
  mimeType: 'image/png',
  content,
});

export const hourlyRevenueChart = (aggregate: ReportAggregate): InlineAsset => {
  const byHour = Array.from({ length: 24 }, () => 0);
  for (const entry of aggregate.hourly) {
    byHour[entry.hour] += entry.amount;
  }
  return pngAsset(CHART_IDS.hourly, 'hourly-revenue.png', renderColumnChart(byHour));
};

export const serviceRevenueChart = (aggregate: ReportAggregate): InlineAsset =>
  pngAsset(
    CHART_IDS.services,
    'service-revenue.png',
    renderBarChart(aggregate.services.map((service) => service.amount)),
  );

export const paymentMixChart = (aggregate: ReportAggregate): InlineAsset =>
  pngAsset(
    CHART_IDS.payments,
    'payment-mix.png',
    renderShareBar(aggregate.paymentModes.map((mode) => mode.amount)),
  );

export const imageTag = (asset: InlineAsset, alt: string): string =>
  `<img src="cid:${asset.contentId}" alt="${escapeHtml(alt)}" style="max-width: 100%;" />`;

/**
 * Colour key matching the bar order of a chart
 */
export const legend = (entries: readonly BreakdownEntry[], currency: string): string => `
  <ul style="list-style: none; padding: 0;">
    ${entries
      .map(
        (entry, index) =>
          `<li><span style="display: inline-block; width: 12px; height: 12px; background: ${toHex(colorAt(index))};"></span> ${escapeHtml(entry.label)}: ${escapeHtml(formatCurrency(entry.amount, currency))}</li>`,
      )
      .join('\n')}
  </ul>`;
