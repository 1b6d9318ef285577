import { Schema, Prop, SchemaFactory } from '@nestjs/mongoose';
import { Document } from 'mongoose';

@Schema({ collection: 'wallets', timestamps: true })
export class WalletDocument extends Document {
  @Prop({ required: true, unique: true, lowercase: true })
  address!: string;

  @Prop({ required: true, default: '0' })
  balance!: string;

  @Prop({ required: true, default: false })
  rejectsPayouts!: boolean;

  @Prop({ type: [String], default: [] })
  payoutIds!: string[];
}

export const WalletSchema = SchemaFactory.createForClass(WalletDocument);
