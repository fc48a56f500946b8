import { Type } from 'class-transformer';
import { IsInt, Min } from 'class-validator';

export class SetCartItemQuantityDto {
  @Type(() => Number)
  @IsInt()
  @Min(0)
  quantity!: number;
}
