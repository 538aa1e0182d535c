import { z } from 'zod';
import { parsePurchaseDate, parsePurchaseTime } from '../dateUtils';
import { isAmount } from '../money';

export const AmountSchema = z
    .string()
    .refine(isAmount, 'Expected an amount with exactly two decimals');

export const ItemSchema = z.object({
    shortDescription: z
        .string()
        .refine((value) => value.trim().length > 0, 'Description cannot be blank'),
    price: AmountSchema,
});

export type Item = z.infer<typeof ItemSchema>;

export const ReceiptSchema = z.object({
    retailer: z.string().regex(/^[\w\s\-&]+$/, 'Invalid retailer name'),
    purchaseDate: z
        .string()
        .refine((value) => parsePurchaseDate(value) !== undefined, 'Expected a YYYY-MM-DD date'),
    purchaseTime: z
        .string()
        .refine((value) => parsePurchaseTime(value) !== undefined, 'Expected a 24-hour HH:MM time'),
    items: z.array(ItemSchema).min(1, 'At least one item is required'),
    total: AmountSchema,
});

export type Receipt = z.infer<typeof ReceiptSchema>;

export const ProcessReceiptResponseSchema = z.object({
    id: z.string().min(1),
});

export type ProcessReceiptResponse = z.infer<typeof ProcessReceiptResponseSchema>;

export const GetPointsResponseSchema = z.object({
    points: z.number().int().nonnegative(),
});

export type GetPointsResponse = z.infer<typeof GetPointsResponseSchema>;
