import { BadRequestException, PipeTransform } from '@nestjs/common';
import { isUUID } from 'class-validator';

/** Route ids are database-generated UUIDs; anything else is a 400. */
export class ParseRequiredUuidPipe
  implements PipeTransform<string | undefined, string>
{
  constructor(private readonly paramName: string) {}

  transform(value: string | undefined): string {
    if (value && isUUID(value)) return value;

    throw new BadRequestException({
      statusCode: 400,
      code: 'INVALID_ID',
      message: `${this.paramName} must be a UUID`,
    });
  }
}
