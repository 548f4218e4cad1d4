import { BadRequestException, NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { CartService } from './cart.service';
import { OrdersService } from './orders.service';
import { Order, OrderStatus } from './order.entity';
import { OrderLine } from './order-line.entity';
import { CustomersService } from '../customers/customers.service';
import { Product } from '../products/product.entity';
import { ProductsService } from '../products/products.service';
import { createMockRepo, MockRepo } from '@/test-utils/mock-repo';
import {
  createMockDataSource,
  MockDataSource,
} from '@/test-utils/mock-datasource';

const product = {
  id: 'p-1',
  key: 'trail-shoe',
  name: 'Trail shoe',
  price: 10,
  discountPercent: 15,
  unitsInStock: 5,
  isActive: true,
} as Product;

const cart = {
  id: 'order-1',
  customerId: 'cust-1',
  status: OrderStatus.OPEN,
  version: 1,
} as Order;

describe('CartService', () => {
  let service: CartService;
  let dataSource: MockDataSource;
  let lineRepo: MockRepo<OrderLine>;
  let orders: {
    getOpenOrderForCustomer: jest.Mock;
    createOpenOrder: jest.Mock;
    getOrderLines: jest.Mock;
    deleteOpenOrder: jest.Mock;
  };
  let products: { getActiveByKey: jest.Mock };
  let customers: { getById: jest.Mock };

  beforeEach(async () => {
    lineRepo = createMockRepo<OrderLine>();
    dataSource = createMockDataSource([[OrderLine, lineRepo]]);
    orders = {
      getOpenOrderForCustomer: jest.fn().mockResolvedValue(cart),
      createOpenOrder: jest.fn(),
      getOrderLines: jest.fn().mockResolvedValue([]),
      deleteOpenOrder: jest.fn(),
    };
    products = { getActiveByKey: jest.fn().mockResolvedValue(product) };
    customers = { getById: jest.fn().mockResolvedValue({ id: 'cust-1' }) };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CartService,
        { provide: DataSource, useValue: dataSource },
        { provide: OrdersService, useValue: orders },
        { provide: ProductsService, useValue: products },
        { provide: CustomersService, useValue: customers },
      ],
    }).compile();

    service = module.get(CartService);
  });

  describe('getCart', () => {
    it('returns an empty view when the customer has no cart', async () => {
      orders.getOpenOrderForCustomer.mockResolvedValue(null);

      await expect(service.getCart('cust-1')).resolves.toEqual({
        orderId: null,
        lines: [],
        totalItems: 0,
        total: 0,
      });
    });

    it('prices each line and the cart', async () => {
      orders.getOrderLines.mockResolvedValue([
        { quantity: 3, unitPrice: 10, discountPercent: 15, product },
      ]);

      await expect(service.getCart('cust-1')).resolves.toEqual({
        orderId: 'order-1',
        lines: [
          {
            productKey: 'trail-shoe',
            productName: 'Trail shoe',
            quantity: 3,
            unitPrice: 10,
            discountPercent: 15,
            lineTotal: 25.5,
          },
        ],
        totalItems: 3,
        total: 25.5,
      });
    });

    it('propagates NotFound for an unknown customer', async () => {
      customers.getById.mockRejectedValue(
        new NotFoundException('Customer not found'),
      );

      await expect(service.getCart('ghost')).rejects.toBeInstanceOf(
        NotFoundException,
      );
      expect(orders.getOpenOrderForCustomer).not.toHaveBeenCalled();
    });
  });

  describe('addItem', () => {
    it('increments the quantity of a product already in the cart', async () => {
      lineRepo.findOne.mockResolvedValue({ id: 'line-1', quantity: 2 });

      await service.addItem('cust-1', 'trail-shoe', 2);

      expect(lineRepo.save).toHaveBeenCalledWith({ id: 'line-1', quantity: 4 });
      expect(lineRepo.create).not.toHaveBeenCalled();
    });

    it('snapshots price and discount on a new line', async () => {
      lineRepo.findOne.mockResolvedValue(null);

      await service.addItem('cust-1', 'trail-shoe');

      expect(lineRepo.create).toHaveBeenCalledWith({
        orderId: 'order-1',
        productId: 'p-1',
        quantity: 1,
        unitPrice: 10,
        discountPercent: 15,
      });
    });

    it('locks the cart and starts one when the customer has none', async () => {
      orders.getOpenOrderForCustomer.mockResolvedValue(null);
      orders.createOpenOrder.mockResolvedValue({ ...cart, id: 'order-2' });
      lineRepo.findOne.mockResolvedValue(null);

      const view = await service.addItem('cust-1', 'trail-shoe');

      expect(orders.getOpenOrderForCustomer).toHaveBeenCalledWith(
        'cust-1',
        dataSource.manager,
        { lock: true },
      );
      expect(orders.createOpenOrder).toHaveBeenCalledWith(
        'cust-1',
        dataSource.manager,
      );
      expect(view.orderId).toBe('order-2');
    });

    it('rejects a cumulative quantity above stock', async () => {
      lineRepo.findOne.mockResolvedValue({ id: 'line-1', quantity: 4 });

      await expect(service.addItem('cust-1', 'trail-shoe', 2)).rejects.toThrow(
        new BadRequestException("Only 5 units of 'trail-shoe' in stock"),
      );
      expect(lineRepo.save).not.toHaveBeenCalled();
    });

    it('rejects a non-positive quantity before touching the database', async () => {
      await expect(
        service.addItem('cust-1', 'trail-shoe', 0),
      ).rejects.toBeInstanceOf(BadRequestException);
      expect(dataSource.transaction).not.toHaveBeenCalled();
    });
  });

  describe('updateQuantity', () => {
    it('sets the new quantity within stock', async () => {
      lineRepo.findOne.mockResolvedValue({ id: 'line-1', quantity: 1 });

      await service.updateQuantity('cust-1', 'trail-shoe', 5);

      expect(lineRepo.save).toHaveBeenCalledWith({ id: 'line-1', quantity: 5 });
    });

    it('removes the line at quantity zero and drops the emptied cart', async () => {
      lineRepo.findOne.mockResolvedValue({ id: 'line-1', quantity: 3 });
      orders.getOrderLines.mockResolvedValue([]);

      const view = await service.updateQuantity('cust-1', 'trail-shoe', 0);

      expect(lineRepo.delete).toHaveBeenCalledWith({ id: 'line-1' });
      expect(orders.deleteOpenOrder).toHaveBeenCalledWith(
        cart,
        dataSource.manager,
      );
      expect(view.orderId).toBeNull();
    });

    it('removes the line at a negative quantity and reprices the rest', async () => {
      lineRepo.findOne.mockResolvedValue({ id: 'line-1', quantity: 3 });
      orders.getOrderLines.mockResolvedValue([
        { quantity: 2, unitPrice: 4, discountPercent: 25, product },
      ]);

      const view = await service.updateQuantity('cust-1', 'trail-shoe', -2);

      expect(lineRepo.delete).toHaveBeenCalledWith({ id: 'line-1' });
      expect(lineRepo.save).not.toHaveBeenCalled();
      expect(orders.deleteOpenOrder).not.toHaveBeenCalled();
      expect(view.total).toBe(6);
      expect(view.totalItems).toBe(2);
    });

    it('rejects a quantity above stock', async () => {
      lineRepo.findOne.mockResolvedValue({ id: 'line-1', quantity: 1 });

      await expect(
        service.updateQuantity('cust-1', 'trail-shoe', 6),
      ).rejects.toBeInstanceOf(BadRequestException);
      expect(lineRepo.save).not.toHaveBeenCalled();
    });

    it('throws NotFound without a cart', async () => {
      orders.getOpenOrderForCustomer.mockResolvedValue(null);

      await expect(
        service.updateQuantity('cust-1', 'trail-shoe', 2),
      ).rejects.toThrow(new NotFoundException('No active cart found'));
    });
  });

  describe('removeItem', () => {
    it('keeps the cart while other lines remain', async () => {
      lineRepo.findOne.mockResolvedValue({ id: 'line-1', quantity: 1 });
      orders.getOrderLines.mockResolvedValue([
        { quantity: 2, unitPrice: 4, discountPercent: 0 },
      ]);

      const view = await service.removeItem('cust-1', 'trail-shoe');

      expect(orders.deleteOpenOrder).not.toHaveBeenCalled();
      expect(view.total).toBe(8);
      expect(view.lines[0].productKey).toBeNull();
    });

    it('throws NotFound for a product not in the cart', async () => {
      lineRepo.findOne.mockResolvedValue(null);

      await expect(service.removeItem('cust-1', 'other')).rejects.toThrow(
        new NotFoundException("Product 'other' is not in the cart"),
      );
      expect(lineRepo.delete).not.toHaveBeenCalled();
    });
  });

  describe('clearCart', () => {
    it('deletes the open order', async () => {
      await service.clearCart('cust-1');

      expect(orders.deleteOpenOrder).toHaveBeenCalledWith(
        cart,
        dataSource.manager,
      );
    });

    it('is a no-op without a cart', async () => {
      orders.getOpenOrderForCustomer.mockResolvedValue(null);

      await expect(service.clearCart('cust-1')).resolves.toEqual({
        orderId: null,
        lines: [],
        totalItems: 0,
        total: 0,
      });
      expect(orders.deleteOpenOrder).not.toHaveBeenCalled();
    });
  });
});
