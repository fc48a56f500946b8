import { IResponse } from '../../shared/interfaces';

export interface IDashboardStats {
  totalOrders: number;
  revenue: number;
  menuItems: number;
  averageOrder: number;
}

export interface IDashboardResponse extends IResponse {
  stats: IDashboardStats | null;
}

export interface IPopularItem {
  name: string;
  quantity: number;
}

export interface ICustomerDistribution {
  teachers: number;
  students: number;
}

export interface IAnalytics {
  popularItems: IPopularItem[];
  customerDistribution: ICustomerDistribution;
}

export interface IAnalyticsResponse extends IResponse {
  analytics: IAnalytics | null;
}

export interface IExportFile {
  content: Buffer;
  fileName: string;
  contentType: string;
}

export interface IExportResponse extends IResponse {
  file: IExportFile | null;
}
