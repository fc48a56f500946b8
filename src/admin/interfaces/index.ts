export {
  IAnalytics,
  IAnalyticsResponse,
  ICustomerDistribution,
  IDashboardResponse,
  IDashboardStats,
  IExportFile,
  IExportResponse,
  IPopularItem,
} from './admin.interface';
