import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { MethodNotAllowedException } from '@nestjs/common';
import { PricesController } from './prices.controller';
import { PricesService } from './prices.service';
import { PriceStoreService } from './price-store.service';
import { CurrencyType } from './entities/price-entry.entity';
import { SetPriceDto } from './dto/set-price.dto';
import { UnknownSymbolException } from '../common/exceptions/unknown-symbol.exception';

describe('PricesController', () => {
  let controller: PricesController;
  let store: PriceStoreService;

  const createSetPriceDto = (overrides: Partial<SetPriceDto>): SetPriceDto => {
    return {
      symbol: 'bitcoin',
      amount: 100,
      type: CurrencyType.USD,
      ...overrides,
    };
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [PricesController],
      providers: [
        PriceStoreService,
        PricesService,
        { provide: ConfigService, useValue: new ConfigService({ TOKENS: 'bitcoin,ethereum' }) },
      ],
    }).compile();

    controller = module.get<PricesController>(PricesController);
    store = module.get<PriceStoreService>(PriceStoreService);
  });

  afterEach(() => {
    store.clear();
  });

  describe('getPrices', () => {
    it('should return an empty array on a fresh store', () => {
      expect(controller.getPrices()).toEqual([]);
    });

    it('should serialise entries with capitalised keys', () => {
      controller.setPrice(createSetPriceDto({ symbol: 'bitcoin', amount: 100, type: CurrencyType.USD }));

      expect(controller.getPrices()).toEqual([{ Symbol: 'bitcoin', Amount: 100, Type: 'USD' }]);
    });

    it('should report amounts at full precision', () => {
      controller.setPrice(createSetPriceDto({ amount: 0.123456789 }));
      controller.setPrice(createSetPriceDto({ type: CurrencyType.EUR, amount: 0.000000001 }));

      expect(controller.getPrices()).toEqual([
        { Symbol: 'bitcoin', Amount: 0.123456789, Type: 'USD' },
        { Symbol: 'bitcoin', Amount: 0.000000001, Type: 'EUR' },
      ]);
    });
  });

  describe('setPrice', () => {
    it('should return the stored entry', () => {
      const result = controller.setPrice(createSetPriceDto({ symbol: 'ethereum', amount: 2500, type: CurrencyType.EUR }));

      expect(result).toEqual({ Symbol: 'ethereum', Amount: 2500, Type: 'EUR' });
    });

    it('should keep only the latest amount per pair', () => {
      controller.setPrice(createSetPriceDto({ amount: 100 }));
      controller.setPrice(createSetPriceDto({ amount: 110 }));
      controller.setPrice(createSetPriceDto({ type: CurrencyType.EUR, amount: 95 }));

      expect(controller.getPrices()).toEqual([
        { Symbol: 'bitcoin', Amount: 110, Type: 'USD' },
        { Symbol: 'bitcoin', Amount: 95, Type: 'EUR' },
      ]);
    });

    it('should throw UnknownSymbolException for unregistered symbols', () => {
      expect(() => controller.setPrice(createSetPriceDto({ symbol: 'unknown' }))).toThrow(UnknownSymbolException);
      expect(controller.getPrices()).toEqual([]);
    });
  });

  describe('rejectSetPriceMethod', () => {
    it('should throw MethodNotAllowedException', () => {
      expect(() => controller.rejectSetPriceMethod()).toThrow(MethodNotAllowedException);
    });
  });
});
