/**
 * Half-open UTC interval covering one calendar day in a fixed offset
 */
export interface DayWindow {
  /** Calendar date, YYYY-MM-DD */
  date: string;
  start: Date;
  end: Date;
  /** Offset as ±HH:MM */
  offset: string;
  offsetMinutes: number;
}
