import cors from 'cors';

const defaultOrigins = [
  'http://localhost:3000',
  'http://localhost:5173',
];

/**
 * CORS for browser clients; requests without an Origin header (curl, bots) pass.
 */
export function createCorsMiddleware(extraOrigin?: string) {
  const allowedOrigins = [...defaultOrigins, extraOrigin].filter(
    (origin): origin is string => !!origin
  );

  return cors({
    origin: (
      origin: string | undefined,
      callback: (err: Error | null, allow?: boolean) => void
    ) => {
      if (!origin) return callback(null, true);

      if (allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new Error('Not allowed by CORS'));
      }
    },
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  });
}
