import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { PayoutGateway, PayoutRejectedError } from '../../domain/payout-gateway';
import { WalletDocument } from '../schemas/wallet.schema';

/**
 * Credits raffle payouts to the wallet ledger. A wallet is opened on its
 * first payout; wallets flagged `rejectsPayouts` refuse the funds. Each
 * payout id is credited at most once.
 */
@Injectable()
export class MongoWalletPayoutGateway implements PayoutGateway {
  private readonly logger = new Logger(MongoWalletPayoutGateway.name);

  constructor(
    @InjectModel(WalletDocument.name)
    private readonly walletModel: Model<WalletDocument>,
  ) {}

  async transfer(to: string, amount: bigint, payoutId: string): Promise<void> {
    const address = to.toLowerCase();
    const wallet = await this.walletModel.findOne({ address }).exec();

    if (wallet?.payoutIds?.includes(payoutId)) {
      this.logger.warn(`Payout ${payoutId} already credited to ${address}`);
      return;
    }
    if (wallet?.rejectsPayouts) {
      throw new PayoutRejectedError(address);
    }

    // The credit and its payout id land in one write.
    const balance = BigInt(wallet?.balance ?? '0') + amount;
    await this.walletModel
      .updateOne(
        { address, payoutIds: { $ne: payoutId } },
        { $set: { balance: balance.toString() }, $addToSet: { payoutIds: payoutId } },
        { upsert: true },
      )
      .exec();

    this.logger.log(`Credited ${amount} to ${address} for ${payoutId} (balance ${balance})`);
  }
}
