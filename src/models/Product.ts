import mongoose, { Schema } from 'mongoose';
import { DEFAULT_CATEGORY } from '../lib/constant';

export interface IProduct {
  name: string;
  description: string;
  price: number;
  stock: number;
  imageUrl: string;
  category: string;
  createdAt?: Date;
}

const productSchema = new Schema<IProduct>({
  name: { type: String, required: true, unique: true, trim: true },
  description: { type: String, required: true },
  price: { type: Number, required: true, min: 0 },
  // Sin mínimo: los pedidos concurrentes pueden dejarlo en negativo
  stock: { type: Number, required: true },
  imageUrl: { type: String, required: true },
  category: { type: String, default: DEFAULT_CATEGORY, index: true },
}, { timestamps: true });

export const Product = mongoose.model<IProduct>('Product', productSchema);
