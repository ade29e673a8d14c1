// src/models/counter.ts
import mongoose, { ClientSession, Model, Schema } from 'mongoose';

export interface ICounter {
  _id: string;
  seq: number;
}

const CounterSchema = new Schema<ICounter>(
  {
    _id: { type: String, required: true },
    seq: { type: Number, required: true, default: 0 },
  },
  { versionKey: false }
);

export const Counter: Model<ICounter> = mongoose.model<ICounter>('Counter', CounterSchema);

/**
 * Allocates the next integer id for `name`. Runs inside `session` when given so
 * that an aborted transaction does not burn ids of rows it never wrote.
 */
export async function nextSequence(name: string, session?: ClientSession): Promise<number> {
  const counter = await Counter.findOneAndUpdate(
    { _id: name },
    { $inc: { seq: 1 } },
    { new: true, upsert: true, session }
  ).lean<ICounter>();
  if (!counter) throw new Error(`Counter "${name}" could not be allocated`);
  return counter.seq;
}
