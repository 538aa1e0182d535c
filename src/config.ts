import { z } from 'zod';

export const EnvSchema = z.object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),

    HOST: z.string().default('0.0.0.0'),
    PORT: z.coerce.number().int().positive().max(65_535).default(8081),

    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

    // Passed to express.json(); accepts bytes or strings such as "10mb".
    BODY_LIMIT: z.string().min(1).default('10mb'),
});

export type Env = z.infer<typeof EnvSchema>;

export type AppConfig = {
    nodeEnv: Env['NODE_ENV'];
    host: string;
    port: number;
    logLevel: Env['LOG_LEVEL'];
    bodyLimit: string;
};

export function loadEnv(input: NodeJS.ProcessEnv = process.env): Env {
    return EnvSchema.parse(input);
}

export function loadConfig(input: NodeJS.ProcessEnv = process.env): AppConfig {
    const env = loadEnv(input);
    return {
        nodeEnv: env.NODE_ENV,
        host: env.HOST,
        port: env.PORT,
        logLevel: env.LOG_LEVEL,
        bodyLimit: env.BODY_LIMIT,
    };
}
