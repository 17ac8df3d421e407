import {
  AttachmentService,
  PAYMENT_HEADERS,
  REPORT_HEADERS,
  SERVICE_HEADERS,
  csvEscape,
  slugify,
  toCsv,
} from '../attachment-service';
import { ReportService } from '../report-service';
import { INDIRANAGAR, MG_ROAD, WINDOW, makeRecord } from './fixtures';

describe('AttachmentService', () => {
  let attachmentService: AttachmentService;
  const reports = new ReportService();

  const records = [
    makeRecord({ amount: 10000, paymentMode: 'cash', service: 'Wash' }),
    makeRecord({
      amount: 25050,
      paymentMode: 'upi',
      service: 'Polish',
      payerName: 'Ravi "RK"',
      entryType: null,
      createdAt: new Date('2024-05-01T12:45:00.000Z'),
      owner: { name: 'Ravi, K', contact: null },
      vehicle: { plate: 'KA01', type: 'SUV', model: null },
    }),
  ];
  const summary = reports.summarizeLocation(MG_ROAD, records, WINDOW);

  beforeEach(() => {
    attachmentService = new AttachmentService();
  });

  describe('buildReportCsv', () => {
    it('should write one line per record in the report offset', () => {
      expect(attachmentService.buildReportCsv(summary, WINDOW)).toBe(
        [
          REPORT_HEADERS.join(','),
          'Asha Rao,98450,KA05,Swift,Hatchback,Wash,100.00,cash,,manual,01/05/2024 10:00,MG Road',
          '"Ravi, K",,KA01,,SUV,Polish,250.50,upi,"Ravi ""RK""",,01/05/2024 18:15,MG Road',
        ].join('\n') + '\n',
      );
    });

    it('should name each row after its own location when consolidated', () => {
      const other = reports.summarizeLocation(
        INDIRANAGAR,
        [makeRecord({ locationId: INDIRANAGAR.id })],
        WINDOW,
      );
      const consolidated = reports.consolidate([summary, other]);

      const lines = attachmentService.buildReportCsv(consolidated, WINDOW).trimEnd().split('\n');

      expect(lines.map((line) => line.split(',').pop())).toEqual([
        'Location',
        'MG Road',
        'MG Road',
        'Indiranagar',
      ]);
    });
  });

  describe('buildPaymentCsv', () => {
    it('should list payment modes with their share and payer accounts', () => {
      expect(attachmentService.buildPaymentCsv(summary)).toBe(
        [
          PAYMENT_HEADERS.join(','),
          'UPI,1,250.50,71.5%,"Ravi ""RK"": 250.50 (1 vehicles)"',
          'Cash,1,100.00,28.5%,N/A',
        ].join('\n') + '\n',
      );
    });
  });

  describe('buildServiceCsv', () => {
    it('should list services with average price and share', () => {
      expect(attachmentService.buildServiceCsv(summary)).toBe(
        [SERVICE_HEADERS.join(','), 'Polish,1,250.50,250.50,71.5%', 'Wash,1,100.00,100.00,28.5%'].join(
          '\n',
        ) + '\n',
      );
    });
  });

  describe('build', () => {
    it('should name files after the report date and location', () => {
      const files = attachmentService.build(summary, WINDOW);

      expect(files.map((file) => file.filename)).toEqual([
        'report_2024-05-01_mg-road.csv',
        'payment_2024-05-01_mg-road.csv',
        'service_2024-05-01_mg-road.csv',
      ]);
    });

    it('should use a consolidated token for several locations', () => {
      const consolidated = reports.consolidate([summary]);

      expect(attachmentService.build(consolidated, WINDOW)[0].filename).toBe(
        'report_2024-05-01_consolidated.csv',
      );
    });

    it('should produce identical files for identical input', () => {
      const first = attachmentService.build(reports.summarizeLocation(MG_ROAD, records, WINDOW), WINDOW);
      const second = new AttachmentService().build(reports.summarizeLocation(MG_ROAD, records, WINDOW), WINDOW);

      expect(second).toHaveLength(3);
      second.forEach((file, index) => {
        expect(file.filename).toBe(first[index].filename);
        expect(file.content).toBe(first[index].content);
      });
    });

    it('should write the same payment and service files whatever the record order', () => {
      const withTies = [...records, makeRecord({ amount: 10000, paymentMode: 'card', service: 'Vacuum' })];
      const forward = reports.summarizeLocation(MG_ROAD, withTies, WINDOW);
      const reversed = reports.summarizeLocation(MG_ROAD, [...withTies].reverse(), WINDOW);

      expect(reversed.totalAmount).toBe(forward.totalAmount);
      expect(reversed.count).toBe(forward.count);
      expect(attachmentService.buildPaymentCsv(reversed)).toBe(attachmentService.buildPaymentCsv(forward));
      expect(attachmentService.buildServiceCsv(reversed)).toBe(attachmentService.buildServiceCsv(forward));
    });

    it('should leave out attachments without data rows', () => {
      const empty = reports.summarizeLocation(MG_ROAD, [], WINDOW);

      expect(attachmentService.build(empty, WINDOW)).toEqual([]);
    });
  });

  describe('csv helpers', () => {
    it('should quote fields holding commas, quotes or line breaks', () => {
      expect(csvEscape('plain')).toBe('plain');
      expect(csvEscape(' padded ')).toBe('padded');
      expect(csvEscape('a\nb,c')).toBe('"a b,c"');
      expect(csvEscape('say "hi"')).toBe('"say ""hi"""');
      expect(csvEscape(5)).toBe('5');
      expect(csvEscape(null)).toBe('');
    });

    it('should produce no payload for no rows', () => {
      expect(toCsv(['A', 'B'], [])).toBe('');
      expect(toCsv(['A', 'B'], [['1', null]])).toBe('A,B\n1,\n');
    });

    it('should slugify location names', () => {
      expect(slugify('  MG Road #2 ')).toBe('mg-road-2');
      expect(slugify('***')).toBe('location');
    });
  });
});
