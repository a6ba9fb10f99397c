// src/controllers/__fixtures__/http.ts
//
// Express request/response stand-ins for calling handlers directly.

import express, { Request, Response } from "express";

interface RequestParts {
  body?: unknown;
  params?: Record<string, string>;
  query?: Record<string, string>;
}

export const createRequest = ({ body, params = {}, query = {} }: RequestParts = {}): Request => {
  const req: Request = Object.create(express.request);
  req.body = body;
  req.params = params;
  req.query = query;
  return req;
};

export interface SentResponse {
  status?: number;
  body?: unknown;
}

export const createResponse = () => {
  const sent: SentResponse = {};
  const res: Response = Object.create(express.response);
  res.status = (code: number) => {
    sent.status = code;
    return res;
  };
  res.json = (body: unknown) => {
    sent.body = body;
    return res;
  };
  return { res, sent };
};

export interface LeanQuery {
  lean: () => Promise<unknown>;
}

export const lean = (value: unknown): LeanQuery => ({ lean: async () => value });
