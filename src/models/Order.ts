import mongoose, { Schema, Types } from 'mongoose';
import { cartItemSchema, ICartItem } from './Cart';
import { ORDER_STATUSES, OrderStatus } from '../types/store';

export interface IOrder {
  user: Types.ObjectId;
  orderItems: ICartItem[];
  totalAmount: number;
  orderDate: Date;
  status: OrderStatus;
  shippingAddress: string;
  paymentInfo: string;
}

const orderSchema = new Schema<IOrder>({
  user: {
    type: Schema.Types.ObjectId,
    ref: 'User',
    required: true,
    immutable: true,
    index: true,
  },
  // Copia de las líneas del carrito en el momento del pedido
  orderItems: { type: [cartItemSchema], immutable: true },
  totalAmount: { type: Number, required: true, immutable: true },
  orderDate: { type: Date, default: Date.now, immutable: true },
  status: {
    type: String,
    enum: [...ORDER_STATUSES],
    default: 'Pending',
  },
  shippingAddress: { type: String, default: '' },
  paymentInfo: { type: String, default: '' },
});

export const Order = mongoose.model<IOrder>('Order', orderSchema);
