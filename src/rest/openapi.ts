import { INTERVALS } from "../history/types.js";

const errorResponse = {
  description: "Error",
  content: {
    "application/json": {
      schema: { $ref: "#/components/schemas/Error" },
    },
  },
};

const historicalRequestBody = {
  required: true,
  content: {
    "application/json": {
      schema: { $ref: "#/components/schemas/HistoricalRequest" },
    },
  },
};

const symbolParam = {
  name: "symbol",
  in: "path",
  required: true,
  schema: { type: "string", example: "AAPL" },
};

const nullableNumber = { type: "number", nullable: true };
const nullableString = { type: "string", nullable: true };

const spec = {
  openapi: "3.0.3",
  info: {
    title: "Stock History Service",
    version: "1.0.0",
    description:
      "Historical OHLCV bars and price-series analytics (average, high/low close, population volatility, total return) over Yahoo Finance data.",
  },
  paths: {
    "/api/historical-data": {
      post: {
        operationId: "getHistoricalData",
        summary: "Bars for a symbol over an inclusive date range",
        requestBody: historicalRequestBody,
        responses: {
          "200": {
            description: "Bars (possibly empty) in ascending date order",
            content: { "application/json": { schema: { $ref: "#/components/schemas/HistoryResponse" } } },
          },
          "400": errorResponse,
          "404": errorResponse,
          "502": errorResponse,
        },
      },
    },
    "/api/analytical-insights": {
      post: {
        operationId: "getAnalyticalInsights",
        summary: "Aggregate statistics over a symbol's closes",
        requestBody: historicalRequestBody,
        responses: {
          "200": {
            description: "Statistics, with bars unless include_bars is false",
            content: { "application/json": { schema: { $ref: "#/components/schemas/InsightsResponse" } } },
          },
          "400": errorResponse,
          "404": errorResponse,
          "422": { ...errorResponse, description: "EmptySeries — no bars in the range" },
          "502": errorResponse,
        },
      },
    },
    "/api/company-info/{symbol}": {
      get: {
        operationId: "getCompanyInfo",
        summary: "Company profile",
        parameters: [symbolParam],
        responses: {
          "200": {
            description: "Profile fields",
            content: { "application/json": { schema: { $ref: "#/components/schemas/CompanyInfo" } } },
          },
          "400": errorResponse,
          "404": errorResponse,
          "502": errorResponse,
        },
      },
    },
    "/api/stock-data/{symbol}": {
      get: {
        operationId: "getStockData",
        summary: "Latest quote snapshot (delayed)",
        parameters: [symbolParam],
        responses: {
          "200": {
            description: "Snapshot fields",
            content: { "application/json": { schema: { $ref: "#/components/schemas/MarketData" } } },
          },
          "400": errorResponse,
          "404": errorResponse,
          "502": errorResponse,
        },
      },
    },
    "/health": {
      get: {
        operationId: "getHealth",
        summary: "Liveness check",
        responses: { "200": { description: "Service is up" } },
      },
    },
  },
  components: {
    schemas: {
      HistoricalRequest: {
        type: "object",
        required: ["symbol", "start_date", "end_date"],
        properties: {
          symbol: { type: "string", example: "AAPL" },
          start_date: { type: "string", format: "date", example: "2024-01-02" },
          end_date: { type: "string", format: "date", example: "2024-03-28" },
          interval: {
            type: "string",
            enum: [...INTERVALS, "1d", "1wk", "1mo", "3mo"],
            default: "daily",
          },
          include_bars: { type: "boolean", default: true, description: "analytical-insights only" },
        },
      },
      Bar: {
        type: "object",
        properties: {
          date: { type: "string", format: "date" },
          timestamp: { type: "string", format: "date-time" },
          open: { type: "number" },
          high: { type: "number" },
          low: { type: "number" },
          close: { type: "number" },
          adj_close: nullableNumber,
          volume: { type: "integer" },
        },
      },
      HistoryResponse: {
        type: "object",
        properties: {
          symbol: { type: "string" },
          interval: { type: "string", enum: [...INTERVALS] },
          start_date: { type: "string", format: "date" },
          end_date: { type: "string", format: "date" },
          count: { type: "integer" },
          bars: { type: "array", items: { $ref: "#/components/schemas/Bar" } },
        },
      },
      InsightsResponse: {
        type: "object",
        properties: {
          symbol: { type: "string" },
          interval: { type: "string", enum: [...INTERVALS] },
          start_date: { type: "string", format: "date" },
          end_date: { type: "string", format: "date" },
          bar_count: { type: "integer" },
          average_close: { type: "number" },
          max_close: { type: "number" },
          min_close: { type: "number" },
          max_close_date: { type: "string", format: "date" },
          min_close_date: { type: "string", format: "date" },
          volatility: { type: "number", description: "Population standard deviation of closes" },
          total_return: { type: "number", description: "Ratio; 0.5 means +50%" },
          first_date: { type: "string", format: "date" },
          last_date: { type: "string", format: "date" },
          bars: { type: "array", items: { $ref: "#/components/schemas/Bar" } },
        },
      },
      CompanyInfo: {
        type: "object",
        properties: {
          symbol: { type: "string" },
          name: nullableString,
          summary: nullableString,
          industry: nullableString,
          sector: nullableString,
          website: nullableString,
          officers: {
            type: "array",
            items: {
              type: "object",
              properties: {
                name: nullableString,
                title: nullableString,
                age: nullableNumber,
                year_born: nullableNumber,
              },
            },
          },
        },
      },
      MarketData: {
        type: "object",
        properties: {
          symbol: { type: "string" },
          currency: nullableString,
          last_price: nullableNumber,
          previous_close: nullableNumber,
          open: nullableNumber,
          day_high: nullableNumber,
          day_low: nullableNumber,
          volume: nullableNumber,
          market_cap: nullableNumber,
          fifty_two_week_high: nullableNumber,
          fifty_two_week_low: nullableNumber,
        },
      },
      Error: {
        type: "object",
        properties: {
          error: {
            type: "string",
            enum: [
              "InvalidRequest",
              "InvalidSymbol",
              "InvalidDateFormat",
              "InvalidDateRange",
              "InvalidInterval",
              "SymbolNotFound",
              "UpstreamUnavailable",
              "EmptySeries",
              "InternalError",
              "NotFound",
            ],
          },
          message: { type: "string" },
        },
      },
    },
  },
};

export function getOpenApiSpec(): typeof spec {
  return spec;
}
