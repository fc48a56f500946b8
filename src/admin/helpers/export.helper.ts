import { unparse } from 'papaparse';
import PDFDocument from 'pdfkit';
import { customerTypeLabel, describeOrderItems } from '../../order/helpers';
import { IOrder } from '../../order/interfaces';
import { formatMoney } from '../../shared/helpers';

export const CSV_COLUMNS = [
  'Order ID',
  'Customer',
  'Type',
  'Items',
  'Total',
  'Date',
];
export const REPORT_TITLE = 'ByteBite Orders Report';

// The standard PDF fonts cannot draw the rupee sign
export const PDF_CURRENCY = 'Rs.';
export const LETTER_HEIGHT = 792;
export const PAGE_MARGIN = 50;
export const LINE_HEIGHT = 15;
// top of the title and of every continuation page
const PAGE_TOP_Y = 42;
const FIRST_LINE_Y = PAGE_TOP_Y + 30;

export interface IPdfLine {
  text: string;
  y: number;
}

export const renderOrdersCsv = (orders: IOrder[]): string =>
  unparse(
    {
      fields: CSV_COLUMNS,
      data: orders.map((order) => [
        order.id,
        order.customerName,
        customerTypeLabel(order.customerType),
        describeOrderItems(order.items, '; '),
        formatMoney(order.totalAmount),
        order.date,
      ]),
    },
    { newline: '\n' },
  );

export const formatPdfOrderLine = (order: IOrder): string =>
  `#${order.id}: ${order.customerName} - ${describeOrderItems(
    order.items,
    ', ',
  )} - ${PDF_CURRENCY} ${formatMoney(order.totalAmount)}`;

export const paginateOrderLines = (
  orders: IOrder[],
  pageHeight = LETTER_HEIGHT,
): IPdfLine[][] => {
  const lastLineY = pageHeight - PAGE_MARGIN;
  const pages: IPdfLine[][] = [[]];
  let y = FIRST_LINE_Y;

  for (const order of orders) {
    if (y > lastLineY) {
      pages.push([]);
      y = PAGE_TOP_Y;
    }
    pages[pages.length - 1].push({ text: formatPdfOrderLine(order), y });
    y += LINE_HEIGHT;
  }
  return pages;
};

export const renderOrdersPdf = (orders: IOrder[]): Promise<Buffer> =>
  new Promise((resolve, reject) => {
    const doc = new PDFDocument({ size: 'LETTER', margin: PAGE_MARGIN });
    const chunks: Buffer[] = [];
    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);

    doc
      .font('Helvetica-Bold')
      .fontSize(16)
      .text(REPORT_TITLE, PAGE_MARGIN, PAGE_TOP_Y);
    doc.font('Helvetica').fontSize(10);

    paginateOrderLines(orders, doc.page.height).forEach((lines, index) => {
      if (index > 0) doc.addPage();
      for (const { text, y } of lines) {
        doc.text(text, PAGE_MARGIN, y, { lineBreak: false });
      }
    });
    doc.end();
  });
