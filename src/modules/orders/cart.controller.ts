import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  Patch,
  Post,
} from '@nestjs/common';

import { CartService } from './cart.service';
import { AddCartItemDto } from './dto/add-cart-item.dto';
import { UpdateCartItemDto } from './dto/update-cart-item.dto';
import { ParseRequiredUuidPipe } from '../../common/pipes/parse-required-uuid.pipe';

@Controller('customers/:customerId/cart')
export class CartController {
  constructor(private readonly cartService: CartService) {}

  @Get()
  getCart(
    @Param('customerId', new ParseRequiredUuidPipe('customerId'))
    customerId: string,
  ) {
    return this.cartService.getCart(customerId);
  }

  @Post('items')
  addItem(
    @Param('customerId', new ParseRequiredUuidPipe('customerId'))
    customerId: string,
    @Body() dto: AddCartItemDto,
  ) {
    return this.cartService.addItem(customerId, dto.productKey, dto.quantity);
  }

  @Patch('items/:productKey')
  updateItem(
    @Param('customerId', new ParseRequiredUuidPipe('customerId'))
    customerId: string,
    @Param('productKey') productKey: string,
    @Body() dto: UpdateCartItemDto,
  ) {
    return this.cartService.updateQuantity(customerId, productKey, dto.quantity);
  }

  @Delete('items/:productKey')
  removeItem(
    @Param('customerId', new ParseRequiredUuidPipe('customerId'))
    customerId: string,
    @Param('productKey') productKey: string,
  ) {
    return this.cartService.removeItem(customerId, productKey);
  }

  @Delete()
  clearCart(
    @Param('customerId', new ParseRequiredUuidPipe('customerId'))
    customerId: string,
  ) {
    return this.cartService.clearCart(customerId);
  }
}
