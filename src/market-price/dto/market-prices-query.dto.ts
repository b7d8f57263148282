import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class MarketPricesQueryDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  coin?: string;
}
