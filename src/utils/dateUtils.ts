import { format } from 'date-fns';

// Formato de fecha de resúmenes y confirmaciones de pedido (hora local del servidor)
export function formatOrderTime(date: Date): string {
  return format(date, 'yyyy-MM-dd HH:mm:ss');
}
