const quoteSchema = {
  type: 'object',
  properties: {
    currency: { type: 'string', example: 'USD/RUB' },
    rate: { type: 'number', example: 92.5 },
    rawRate: { type: 'number', example: 92.5031 },
    change: { type: 'number', example: 0.25 },
    changePercent: { type: 'number', example: 0.27 },
    changeObserved: { type: 'boolean' },
    asOfDate: { type: 'string', format: 'date' },
    source: { type: 'string', example: 'cbr-direct' },
    isRealData: { type: 'boolean' },
    nominal: { type: 'number', example: 1 }
  }
};

const historyPointSchema = {
  type: 'object',
  properties: {
    date: { type: 'string', format: 'date', example: '2026-10-18' },
    displayDate: { type: 'string', example: '18.10' },
    price: { type: 'number', example: 92.41 }
  }
};

const errorSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', example: 'error' },
    message: { type: 'string' }
  }
};

const daysParameter = {
  name: 'days',
  in: 'query',
  required: false,
  description: 'Length of the synthesized series (1-365, default 30)',
  schema: { type: 'integer', minimum: 1, maximum: 365 }
};

export const openApiSpec = {
  openapi: '3.1.0',
  info: {
    title: 'USD/RUB Rate Dashboard API',
    version: '1.0.0',
    description: `Current USD/RUB rate from the Central Bank of Russia (cbr.ru) with a synthesized 30-day series for charting.

**Sources, in order:**
- CBR daily XML feed, direct
- The same feed through each configured relay
- Alternate JSON providers (cbr-xml-daily.ru, open.er-api.com, exchangerate-api.com)
- A fixed fallback rate, flagged \`isRealData: false\`

**Note:** the history is fabricated around the current rate; only the last point is real.`
  },
  servers: [
    {
      url: 'http://localhost:8000',
      description: 'Development server'
    }
  ],
  paths: {
    '/health': {
      get: {
        summary: 'Liveness probe',
        tags: ['System'],
        responses: {
          '200': { description: 'Plain-text OK', content: { 'text/plain': { schema: { type: 'string', example: 'OK' } } } }
        }
      }
    },
    '/api/health': {
      get: {
        summary: 'Health check',
        tags: ['System'],
        responses: {
          '200': {
            description: 'API is healthy',
            content: {
              'application/json': {
                schema: {
                  type: 'object',
                  properties: {
                    status: { type: 'string', example: 'ok' },
                    timestamp: { type: 'string', format: 'date-time' },
                    uptimeSeconds: { type: 'number' },
                    strategies: { type: 'array', items: { type: 'string' } }
                  }
                }
              }
            }
          }
        }
      }
    },
    '/api/current': {
      get: {
        summary: 'Current quote',
        description: 'Resolves the rate through the source chain and returns it as a flat record.',
        tags: ['Rates'],
        responses: {
          '200': {
            description: 'Current quote',
            content: {
              'application/json': {
                schema: {
                  type: 'object',
                  properties: {
                    currency: { type: 'string', example: 'USD/RUB' },
                    rate: { type: 'number' },
                    change: { type: 'number' },
                    changePercent: { type: 'number' },
                    asOfDate: { type: 'string', format: 'date' },
                    timestamp: { type: 'string', format: 'date-time' },
                    source: { type: 'string' },
                    isRealData: { type: 'boolean' }
                  }
                }
              }
            }
          }
        }
      }
    },
    '/api/history': {
      get: {
        summary: 'Synthesized history',
        tags: ['Rates'],
        parameters: [daysParameter],
        responses: {
          '200': {
            description: 'Series ending today',
            content: {
              'application/json': {
                schema: {
                  type: 'object',
                  properties: {
                    status: { type: 'string', example: 'success' },
                    days: { type: 'integer', example: 30 },
                    anchor: { type: 'number' },
                    source: { type: 'string' },
                    isRealData: { type: 'boolean' },
                    data: { type: 'array', items: historyPointSchema }
                  }
                }
              }
            }
          },
          '400': { description: 'Invalid days', content: { 'application/json': { schema: errorSchema } } }
        }
      }
    },
    '/api/dashboard': {
      get: {
        summary: 'Everything the page needs',
        tags: ['Rates'],
        parameters: [daysParameter],
        responses: {
          '200': {
            description: 'Quote, series and statistics',
            content: {
              'application/json': {
                schema: {
                  type: 'object',
                  properties: {
                    quote: quoteSchema,
                    history: { type: 'array', items: historyPointSchema },
                    stats: {
                      type: 'object',
                      properties: {
                        current: { type: 'number' },
                        min: { type: 'number' },
                        minDate: { type: 'string' },
                        max: { type: 'number' },
                        maxDate: { type: 'string' },
                        average: { type: 'number' },
                        change30d: { type: 'number' },
                        change30dPercent: { type: 'number' },
                        firstDate: { type: 'string' },
                        lastDate: { type: 'string' }
                      }
                    },
                    generatedAt: { type: 'string', format: 'date-time' },
                    degraded: { type: 'boolean' },
                    notice: { type: 'string' }
                  }
                }
              }
            }
          },
          '400': { description: 'Invalid days', content: { 'application/json': { schema: errorSchema } } }
        }
      }
    }
  }
};
