export { IResponse } from './response.interface';
