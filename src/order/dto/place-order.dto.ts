import { IsEnum, IsOptional, IsString } from 'class-validator';
import { CustomerType } from '../enums';

export class PlaceOrderDto {
  @IsString()
  @IsOptional()
  customerName?: string;

  @IsEnum(CustomerType)
  @IsOptional()
  customerType?: CustomerType;
}
