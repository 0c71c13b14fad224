import PDFDocument from 'pdfkit';
import type { Client } from '../models/client';
import type { InvoiceDetail } from '../models/invoice';
import { formatMoney, parseDecimal } from './decimal';
import { defaultPDFStyles, statusColors, statusLabels } from './pdf-styles';
import type { PDFStyleConfig } from './pdf-styles';
import { toPdfText } from './pdf-text';

export interface InvoicePdfOptions {
  companyName: string;
  currency: string;
  styles?: PDFStyleConfig;
}

/** Exact amounts are shown rounded half-even to cents. */
export function formatAmount(amount: string, currency: string): string {
  return toPdfText(`${formatMoney(parseDecimal(amount, 'amount'))} ${currency}`);
}

export function generateInvoicePDF(
  invoice: InvoiceDetail,
  client: Client | null,
  options: InvoicePdfOptions,
): PDFKit.PDFDocument {
  const styles = options.styles ?? defaultPDFStyles;
  const c = styles.colors;
  const m = styles.spacing.margin;
  const pw = styles.layout.pageWidth;
  const cw = styles.layout.contentWidth;
  const statusLabel = statusLabels[invoice.status];

  const doc = new PDFDocument({
    margin: m,
    size: styles.layout.pageSize,
    info: { Title: `Invoice ${invoice.invoice_number}`, Author: options.companyName },
  });

  let y = m;

  // HEADER
  doc.fillColor(c.primary).fontSize(20).font(styles.fonts.bold).text(toPdfText(options.companyName), m, y);
  doc.fillColor(c.primary).fontSize(18).font(styles.fonts.bold).text(toPdfText(`INVOICE #${invoice.invoice_number}`), m, y, { width: cw, align: 'right' });

  const badgeY = y + 28;
  doc.fontSize(9).font(styles.fonts.bold);
  const badgeW = doc.widthOfString(statusLabel) + 24;
  const badgeX = pw - m - badgeW;
  doc.roundedRect(badgeX, badgeY, badgeW, 20, 10).fillColor(statusColors[invoice.status]).fill();
  doc.fillColor(c.white).text(statusLabel, badgeX, badgeY + 6, { width: badgeW, align: 'center' });

  y = badgeY + 36;
  doc.moveTo(m, y).lineTo(pw - m, y).strokeColor(c.borderLight).lineWidth(1).stroke();
  y += 16;

  // BILL TO / DETAILS
  const dh = 110;
  doc.rect(m, y, cw, dh).fillColor(c.background).fill();
  const lx = m + 16;
  const rx = pw / 2 + 16;

  doc.fillColor(c.textMuted).fontSize(9).font(styles.fonts.bold).text('BILL TO', lx, y + 12);
  let by = y + 28;
  doc.fillColor(c.text).fontSize(12).font(styles.fonts.bold).text(toPdfText(client?.name ?? invoice.client_name ?? ''), lx, by, { width: 220 });
  by += 18;
  doc.fillColor(c.textLight).fontSize(9).font(styles.fonts.body);
  for (const line of [client?.company_code ? `Company code: ${client.company_code}` : null, client?.address, client?.email, client?.phone]) {
    if (line) {
      doc.text(toPdfText(line), lx, by, { width: 220 });
      by += 12;
    }
  }

  doc.fillColor(c.textMuted).fontSize(9).font(styles.fonts.bold).text('DETAILS', rx, y + 12);
  let ry = y + 28;
  const row = (label: string, value: string): void => {
    doc.fillColor(c.textLight).fontSize(9).font(styles.fonts.body).text(label, rx, ry);
    doc.fillColor(c.text).font(styles.fonts.bold).text(value, rx + 85, ry);
    ry += 16;
  };
  row('Invoice date:', invoice.invoice_date);
  if (invoice.due_date) row('Due date:', invoice.due_date);
  if (invoice.payment_date) row('Paid on:', invoice.payment_date);

  y += dh + 20;

  // ITEMS TABLE
  const cols = { description: cw * 0.42, qty: cw * 0.12, unit: cw * 0.16, tax: cw * 0.12, total: cw * 0.18 };
  const rh = styles.spacing.tableRowHeight;

  doc.roundedRect(m, y, cw, rh, 4).fillColor(c.primaryDark).fill();
  doc.fillColor(c.white).fontSize(9).font(styles.fonts.bold);
  const hy = y + 9;
  let x = m + 10;
  doc.text('Description', x, hy, { width: cols.description - 10 });
  x = m + cols.description;
  doc.text('Qty', x, hy, { width: cols.qty, align: 'center' });
  x += cols.qty;
  doc.text('Unit price', x, hy, { width: cols.unit, align: 'right' });
  x += cols.unit;
  doc.text('Tax %', x, hy, { width: cols.tax, align: 'right' });
  x += cols.tax;
  doc.text('Total', x, hy, { width: cols.total - 10, align: 'right' });
  y += rh;

  invoice.items.forEach((item, i) => {
    if (y + rh > styles.layout.pageHeight - m - 120) {
      doc.addPage();
      y = m;
    }
    doc.rect(m, y, cw, rh).fillColor(i % 2 === 0 ? c.white : c.backgroundAlt).fill();
    const ty = y + 9;
    let cx = m + 10;
    doc.fillColor(c.text).fontSize(9).font(styles.fonts.body).text(toPdfText(item.description), cx, ty, { width: cols.description - 20, lineBreak: false, ellipsis: true });
    cx = m + cols.description;
    doc.text(item.quantity, cx, ty, { width: cols.qty, align: 'center' });
    cx += cols.qty;
    doc.text(item.unit_price, cx, ty, { width: cols.unit, align: 'right' });
    cx += cols.unit;
    doc.text(item.tax_rate, cx, ty, { width: cols.tax, align: 'right' });
    cx += cols.tax;
    doc.font(styles.fonts.bold).text(formatMoney(parseDecimal(item.total, 'total')), cx, ty, { width: cols.total - 10, align: 'right' });
    y += rh;
  });

  doc.moveTo(m, y).lineTo(m + cw, y).strokeColor(c.border).lineWidth(1).stroke();
  y += 20;

  // TOTALS
  const totW = 230;
  const totX = pw - m - totW;
  const totH = 84;
  doc.roundedRect(totX, y, totW, totH, 6).fillColor(c.background).fill();

  let ty = y + 12;
  doc.fillColor(c.textLight).fontSize(10).font(styles.fonts.body);
  doc.text('Subtotal:', totX + 14, ty).text(formatAmount(invoice.totals.subtotal, options.currency), totX + 14, ty, { width: totW - 28, align: 'right' });
  ty += 16;
  doc.text('Tax:', totX + 14, ty).text(formatAmount(invoice.totals.tax_total, options.currency), totX + 14, ty, { width: totW - 28, align: 'right' });
  ty += 18;
  doc.moveTo(totX + 14, ty).lineTo(totX + totW - 14, ty).strokeColor(c.border).lineWidth(1).stroke();
  ty += 10;
  doc.fillColor(c.primary).fontSize(13).font(styles.fonts.bold);
  doc.text('Total:', totX + 14, ty).text(formatAmount(invoice.totals.amount_due, options.currency), totX + 14, ty, { width: totW - 28, align: 'right' });

  y += totH + 24;

  if (invoice.notes) {
    doc.fillColor(c.textMuted).fontSize(9).font(styles.fonts.bold).text('NOTES', m, y);
    doc.fillColor(c.textLight).fontSize(9).font(styles.fonts.body).text(toPdfText(invoice.notes), m, y + 14, { width: cw });
  }

  return doc;
}

export async function generateInvoicePDFBuffer(
  invoice: InvoiceDetail,
  client: Client | null,
  options: InvoicePdfOptions,
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = generateInvoicePDF(invoice, client, options);
    const chunks: Buffer[] = [];
    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);
    doc.end();
  });
}
