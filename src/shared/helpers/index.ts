export { roundMoney, formatMoney } from './money.helper';
export {
  errorMessage,
  isFileNotFoundError,
  isUniqueViolation,
} from './error.helper';
