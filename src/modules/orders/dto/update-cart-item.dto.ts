import { Type } from 'class-transformer';
import { IsInt } from 'class-validator';

export class UpdateCartItemDto {
  // zero or less removes the line
  @Type(() => Number)
  @IsInt()
  quantity!: number;
}
