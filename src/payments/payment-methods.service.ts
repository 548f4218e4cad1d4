import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';

import { PaymentMethod } from './payment-method.entity';

@Injectable()
export class PaymentMethodsService {
  constructor(
    @InjectRepository(PaymentMethod)
    private readonly repo: Repository<PaymentMethod>,
  ) {}

  /** Codes are stored lower-case; lookups ignore case and surrounding spaces. */
  async isMethodActive(code: string): Promise<boolean> {
    const count = await this.repo.count({
      where: { code: code.trim().toLowerCase(), isActive: true },
    });
    return count > 0;
  }

  listActiveMethods(): Promise<PaymentMethod[]> {
    return this.repo.find({
      where: { isActive: true },
      order: { displayOrder: 'ASC', title: 'ASC' },
    });
  }
}
