import type { InvoiceStatus } from '../models/invoice';

/**
 * PDF Styling Configuration
 * Colors, fonts and page layout for rendered invoices
 */
export interface PDFStyleConfig {
  colors: {
    primary: string;
    primaryDark: string;
    background: string;
    backgroundAlt: string;
    border: string;
    borderLight: string;
    text: string;
    textLight: string;
    textMuted: string;
    white: string;
  };
  fonts: {
    body: string;
    bold: string;
  };
  spacing: {
    margin: number;
    tableRowHeight: number;
  };
  layout: {
    pageSize: 'LETTER' | 'A4';
    pageWidth: number;
    pageHeight: number;
    contentWidth: number;
  };
}

export const defaultPDFStyles: PDFStyleConfig = {
  colors: {
    primary: '#1e40af',
    primaryDark: '#1e3a8a',
    background: '#f8fafc',
    backgroundAlt: '#f1f5f9',
    border: '#cbd5e1',
    borderLight: '#e2e8f0',
    text: '#0f172a',
    textLight: '#475569',
    textMuted: '#94a3b8',
    white: '#ffffff',
  },
  fonts: {
    body: 'Helvetica',
    bold: 'Helvetica-Bold',
  },
  spacing: {
    margin: 40,
    tableRowHeight: 26,
  },
  layout: {
    pageSize: 'A4',
    pageWidth: 595.28,
    pageHeight: 841.89,
    contentWidth: 515.28, // pageWidth - 2 * margin
  },
};

export const statusLabels: Record<InvoiceStatus, string> = {
  pending: 'PENDING',
  paid: 'PAID',
  overdue: 'OVERDUE',
  cancelled: 'CANCELLED',
};

export const statusColors: Record<InvoiceStatus, string> = {
  pending: '#d97706', // Amber
  paid: '#059669', // Emerald
  overdue: '#dc2626', // Red
  cancelled: '#64748b', // Slate
};
