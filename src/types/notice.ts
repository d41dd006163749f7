export type NoticeLevel = 'success' | 'info' | 'warning' | 'error';

/** Mensaje visible para el usuario que acompaña a una respuesta */
export interface Notice {
  level: NoticeLevel;
  message: string;
}

export const notice = (level: NoticeLevel, message: string): Notice => ({ level, message });
