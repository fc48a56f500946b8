export interface IResponse {
  status: number;
  message: string;
}
