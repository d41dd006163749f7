import mongoose, { Schema, Types } from 'mongoose';
import { DEFAULT_CATEGORY } from '../lib/constant';

export interface ICartItem {
  product: Types.ObjectId;
  name: string;
  price: number;
  imageUrl: string;
  category: string;
  quantity: number;
}

export interface ICart {
  user: Types.ObjectId | null;
  items: ICartItem[];
  createdAt: Date;
  updatedAt: Date;
}

export const cartItemSchema = new Schema<ICartItem>({
  product: { type: Schema.Types.ObjectId, ref: 'Product', required: true },
  name: { type: String, required: true },
  price: { type: Number, required: true },
  imageUrl: { type: String, default: '' },
  category: { type: String, default: DEFAULT_CATEGORY },
  quantity: { type: Number, required: true, min: 1 },
}, { _id: false });

// Un carrito por identidad: se garantiza buscando antes de crear, no con un índice único
const cartSchema = new Schema<ICart>({
  user: { type: Schema.Types.ObjectId, ref: 'User', default: null, index: true },
  items: [cartItemSchema],
}, { timestamps: true });

export const Cart = mongoose.model<ICart>('Cart', cartSchema);
