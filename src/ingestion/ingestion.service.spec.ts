import { Test, TestingModule } from '@nestjs/testing';
import { IngestionService } from './ingestion.service';
import { IngestionController } from './ingestion.controller';
import { DATA_SOURCE } from '../datasource/datasource.interface';
import { FakeDataSource } from '../datasource/testing/fake-data-source';
import { UpstreamApiException } from '../common/exceptions/upstream-api.exception';

describe('IngestionService', () => {
  let service: IngestionService;
  let controller: IngestionController;
  let dataSource: FakeDataSource;

  beforeEach(async () => {
    dataSource = new FakeDataSource();
    dataSource.fills = [{ time: 1, coin: 'BTC' }, { time: 2, coin: 'ETH' }];
    dataSource.funding = [{ time: 3, coin: 'BTC', usdc: '0.1' }];

    const module: TestingModule = await Test.createTestingModule({
      controllers: [IngestionController],
      providers: [IngestionService, { provide: DATA_SOURCE, useValue: dataSource }],
    }).compile();

    service = module.get<IngestionService>(IngestionService);
    controller = module.get<IngestionController>(IngestionController);
  });

  it('should fetch fills and funding together', async () => {
    const activity = await service.fetchActivity('0xabc', 10);

    expect(activity.fills).toEqual([{ time: 1, coin: 'BTC' }, { time: 2, coin: 'ETH' }]);
    expect(activity.funding).toEqual([{ time: 3, coin: 'BTC', usdc: '0.1' }]);
    expect(dataSource.calls.sort()).toEqual(['getFills:0xabc:10', 'getFunding:0xabc:10']);
  });

  it('should reject when the data source fails', async () => {
    dataSource.failure = new UpstreamApiException('Hyperliquid userFunding request failed: socket hang up');

    await expect(service.fetchActivity('0xabc')).rejects.toThrow(
      'Hyperliquid userFunding request failed: socket hang up',
    );
  });

  it('should pass raw records through the /fills and /funding routes untouched', async () => {
    expect(await controller.getFills({ wallet: '0xabc' })).toBe(dataSource.fills);
    expect(await controller.getFunding({ wallet: '0xabc', since: 5 })).toBe(dataSource.funding);
    expect(dataSource.calls).toEqual(['getFills:0xabc', 'getFunding:0xabc:5']);
  });

  it('should forward state and mids requests', async () => {
    dataSource.mids = { BTC: '64000' };

    expect(await service.fetchUserState('0xabc')).toEqual({ assetPositions: [] });
    expect(await service.fetchAllMids()).toEqual({ BTC: '64000' });
  });
});
