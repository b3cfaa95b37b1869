export type AppErrorCode = 'INVALID_INPUT' | 'INVALID_CONFIG';

export interface AppError extends Error {
  code: AppErrorCode;
  isOperational: boolean;
}

export const createError = (message: string, code: AppErrorCode = 'INVALID_INPUT'): AppError => {
  const error = new Error(message);
  return Object.assign(error, { code, isOperational: true });
};

export const isAppError = (error: unknown): error is AppError => {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'INVALID_INPUT' || error.code === 'INVALID_CONFIG')
  );
};
