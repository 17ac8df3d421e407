import { TemplateSelector } from '../../types/common/enums';
import { ReportTemplate } from '../../types/services/report-template';
import { RenderError } from '../../utils/errors/report-errors';
import { ClassicTemplate } from './classic-template';
import { EnhancedTemplate } from './enhanced-template';
import { InsightsTemplate } from './insights-template';

const TEMPLATES: Record<TemplateSelector, () => ReportTemplate> = {
  [TemplateSelector.CLASSIC]: () => new ClassicTemplate(),
  [TemplateSelector.ENHANCED]: () => new EnhancedTemplate(),
  [TemplateSelector.INSIGHTS]: () => new InsightsTemplate(),
};

export const isTemplateSelector = (value: number): value is TemplateSelector =>
  value === TemplateSelector.CLASSIC ||
  value === TemplateSelector.ENHANCED ||
  value === TemplateSelector.INSIGHTS;

/**
 * Request override first, then the owner's preference, then the classic layout
 */
export const resolveTemplateSelector = (
  requested?: number | null,
  preferred?: number | null,
): number => requested ?? preferred ?? TemplateSelector.CLASSIC;

/**
 * Returns the template for a selector
 * @throws RenderError when no template has that selector
 */
export const createTemplate = (selector: number): ReportTemplate => {
  if (!isTemplateSelector(selector)) {
    throw new RenderError(`Unsupported template selector: ${selector}`);
  }
  return TEMPLATES[selector]();
};

export { ClassicTemplate, EnhancedTemplate, InsightsTemplate };
