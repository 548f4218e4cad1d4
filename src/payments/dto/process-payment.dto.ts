import { Type } from 'class-transformer';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Length,
  Matches,
  Max,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';

export class CardDetailsDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  holder!: string;

  @Matches(/^\d{12,19}$/, { message: 'cardNumber must be 12 to 19 digits' })
  cardNumber!: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(12)
  monthExpire!: number;

  @Type(() => Number)
  @IsInt()
  @Min(2024)
  @Max(2099)
  yearExpire!: number;

  @Type(() => Number)
  @IsInt()
  @Min(100)
  @Max(9999)
  cvv2!: number;
}

export class ProcessPaymentDto {
  // checked against the active payment methods, case-insensitively
  @IsString()
  @Length(1, 50)
  method!: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => CardDetailsDto)
  card?: CardDetailsDto;
}
