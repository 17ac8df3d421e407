import { TemplateSelector } from '../common/enums';
import { DayWindow } from '../models/calendar';
import { RenderedReport } from '../models/email';
import { ReportSummary } from '../models/report';

export interface RenderContext {
  summary: ReportSummary;
  window: DayWindow;
  currencySymbol: string;
}

/**
 * One email layout. Every variant returns the same shape so callers never
 * branch on the selector.
 */
export interface ReportTemplate {
  readonly selector: TemplateSelector;
  readonly title: string;
  render(context: RenderContext): RenderedReport;
}
