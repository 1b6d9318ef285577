import { Schema, Prop, SchemaFactory } from '@nestjs/mongoose';
import { Document } from 'mongoose';
import { RaffleState } from '../../domain/raffle-state';

export const CURRENT_RAFFLE_KEY = 'current';

// Amounts and oracle ids are uint256 values, stored as decimal strings.
@Schema({ collection: 'raffles', timestamps: true })
export class RaffleDocument extends Document {
  @Prop({ required: true, unique: true, default: CURRENT_RAFFLE_KEY })
  key!: string;

  @Prop({ required: true })
  entranceFee!: string;

  @Prop({ required: true, min: 1 })
  interval!: number;

  @Prop({ required: true })
  vrfCoordinator!: string;

  @Prop({ required: true })
  keyHash!: string;

  @Prop({ required: true })
  subscriptionId!: string;

  @Prop({ required: true, min: 1 })
  callbackGasLimit!: number;

  @Prop({ type: [String], default: [] })
  players!: string[];

  @Prop({ type: String, required: true, enum: Object.values(RaffleState), default: RaffleState.OPEN })
  raffleState!: RaffleState;

  @Prop({ required: true })
  lastTimestamp!: number;

  @Prop({ type: String, default: null })
  recentWinner!: string | null;

  @Prop({ required: true, default: '0' })
  balance!: string;

  @Prop({ type: String, default: null })
  pendingRequestId!: string | null;

  @Prop({ required: true, default: 0 })
  version!: number;
}

export const RaffleSchema = SchemaFactory.createForClass(RaffleDocument);
