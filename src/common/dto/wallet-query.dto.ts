import { Type } from 'class-transformer';
import { IsInt, IsNotEmpty, IsOptional, IsString, Min } from 'class-validator';

// ?wallet=0x...&since=<epoch ms>, shared by every ledger route.
export class WalletQueryDto {
  @IsString()
  @IsNotEmpty()
  wallet!: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  since?: number;
}
