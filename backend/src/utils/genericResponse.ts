import type { Response } from 'express';

/**
 * Envelope shared by every API response.
 */
export type GenericResponse<T = never> = {
  Success: boolean;
  Message: string | null;
  Data: T | null;
};

export const okResponse = <T>(data: T): GenericResponse<T> => ({
  Success: true,
  Message: 'OK',
  Data: data,
});

const failureResponse = (message: string): GenericResponse => ({
  Success: false,
  Message: message,
  Data: null,
});

export const sendOk = <T>(res: Response, data: T) => {
  res.status(200).json(okResponse(data));
};

export const sendFailure = (res: Response, status: number, message: string) => {
  res.status(status).json(failureResponse(message));
};
