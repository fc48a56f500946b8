export {
  TOP_ITEMS_LIMIT,
  buildDashboardStats,
  countCustomerTypes,
  summarizePopularItems,
} from './analytics.helper';
export {
  CSV_COLUMNS,
  IPdfLine,
  PDF_CURRENCY,
  REPORT_TITLE,
  formatPdfOrderLine,
  paginateOrderLines,
  renderOrdersCsv,
  renderOrdersPdf,
} from './export.helper';
