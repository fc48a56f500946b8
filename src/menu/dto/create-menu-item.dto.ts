import { Transform, Type } from 'class-transformer';
import {
  IsArray,
  IsIn,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import { MENU_CATEGORIES } from '../../constants';

//? Sent as multipart form fields, so numbers and tags arrive as strings
export class CreateMenuItemDto {
  @IsString()
  @IsOptional()
  name?: string;

  @Type(() => Number)
  @IsNumber()
  @IsOptional()
  price?: number;

  @IsIn(MENU_CATEGORIES)
  @IsOptional()
  category?: string;

  @Type(() => Number)
  @IsNumber()
  @Min(0)
  @Max(5)
  @IsOptional()
  rating?: number;

  @Transform(({ value }) =>
    typeof value === 'string'
      ? value
          .split(',')
          .map((tag) => tag.trim())
          .filter((tag) => tag.length > 0)
      : value,
  )
  @IsArray()
  @IsString({ each: true })
  @IsOptional()
  tags?: string[];
}
