export { CustomerType } from './customer-type.enum';
