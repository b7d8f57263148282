import { Inject, Injectable, Logger } from '@nestjs/common';
import { DATA_SOURCE, DataSource } from '../datasource/datasource.interface';

export interface RawActivity {
  fills: unknown[];
  funding: unknown[];
}

// Thin orchestration over the data source, with fetch logging.
@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);

  constructor(@Inject(DATA_SOURCE) private readonly dataSource: DataSource) {}

  async fetchAllFills(wallet: string, since?: number): Promise<unknown[]> {
    this.logger.log(`Fetching fills for wallet: ${wallet}`);
    const fills = await this.dataSource.getFills(wallet, since);
    this.logger.log(`Fetched ${fills.length} fills`);
    return fills;
  }

  async fetchAllFunding(wallet: string, since?: number): Promise<unknown[]> {
    this.logger.log(`Fetching funding for wallet: ${wallet}`);
    const funding = await this.dataSource.getFunding(wallet, since);
    this.logger.log(`Fetched ${funding.length} funding payments`);
    return funding;
  }

  /** Fills and funding are independent, so both paginate concurrently */
  async fetchActivity(wallet: string, since?: number): Promise<RawActivity> {
    const [fills, funding] = await Promise.all([
      this.fetchAllFills(wallet, since),
      this.fetchAllFunding(wallet, since),
    ]);
    return { fills, funding };
  }

  /** Current positions and balances (clearinghouseState) */
  fetchUserState(wallet: string): Promise<unknown> {
    return this.dataSource.getUserState(wallet);
  }

  /** Current mid prices for every listed coin */
  fetchAllMids(): Promise<unknown> {
    return this.dataSource.getAllMids();
  }
}
