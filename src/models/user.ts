import mongoose, { Model, Schema } from 'mongoose';
import { ROLES, Role } from '../types/domain.js';

export interface IUser {
  _id: number;
  uid?: string;
  username: string;
  email?: string;
  roles: Role[];
  createdAt: Date;
  updatedAt: Date;
}

const UserSchema = new Schema<IUser>(
  {
    _id: { type: Number, required: true },
    uid: {
      type: String,
      unique: true,
      sparse: true, // profiles created by staff may not be linked to a login yet
      index: true,
    },
    username: { type: String, required: true, unique: true, trim: true, maxlength: 150 },
    email: { type: String, lowercase: true, trim: true },
    roles: {
      type: [String],
      enum: ROLES,
      default: ['customer'],
      index: true,
    },
  },
  { timestamps: true, versionKey: false }
);

export const User: Model<IUser> = mongoose.model<IUser>('User', UserSchema);
