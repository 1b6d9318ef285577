import { Transform } from 'class-transformer';
import { IsEthereumAddress, IsNotEmpty, IsString, Matches } from 'class-validator';

export class EnterRaffleDto {
  @Transform(({ value }) => (typeof value === 'string' ? value.toLowerCase() : value))
  @IsEthereumAddress()
  player!: string;

  // Payment in the smallest currency unit, as a decimal string
  @IsNotEmpty()
  @IsString()
  @Matches(/^\d+$/, { message: 'amount must be a non-negative integer string' })
  amount!: string;
}
