export {
  ALLOWED_IMAGE_EXTENSIONS,
  IMAGE_CONTENT_TYPE,
  InvalidImageError,
  MAX_IMAGE_WIDTH,
  dishImageFileName,
  isAllowedImageFile,
  normalizeDishImage,
} from './image.helper';
export { calculateTotalPages, toMenuItemView } from './menu.helper';
