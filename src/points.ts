import { parsePurchaseTime } from './dateUtils';
import type { Receipt } from './models/receipt';
import { parseCents } from './money';

export interface PointsBreakdown {
    retailerName: number;
    roundDollarTotal: number;
    quarterMultipleTotal: number;
    itemPairs: number;
    descriptionLength: number;
    afternoonPurchase: number;
}

const AFTERNOON_START = 14 * 60;
const AFTERNOON_END = 16 * 60;

export function retailerNamePoints(retailer: string): number {
    return retailer.replace(/[^A-Za-z0-9]/g, '').length;
}

export function roundDollarPoints(totalCents: number): number {
    return totalCents % 100 === 0 ? 50 : 0;
}

export function quarterMultiplePoints(totalCents: number): number {
    return totalCents % 25 === 0 ? 25 : 0;
}

export function itemPairPoints(itemCount: number): number {
    return Math.floor(itemCount / 2) * 5;
}

// ceil(price * 0.2) on cents is ceil(cents / 500).
export function descriptionLengthPoints(items: Receipt['items']): number {
    let points = 0;
    for (const item of items) {
        const length = item.shortDescription.trim().length;
        if (length > 0 && length % 3 === 0) {
            points += Math.ceil(parseCents(item.price) / 500);
        }
    }
    return points;
}

export function afternoonPurchasePoints(purchaseTime: string): number {
    const minutes = parsePurchaseTime(purchaseTime);
    if (minutes === undefined) return 0;
    return minutes > AFTERNOON_START && minutes < AFTERNOON_END ? 10 : 0;
}

export function pointsBreakdown(receipt: Receipt): PointsBreakdown {
    const totalCents = parseCents(receipt.total);
    return {
        retailerName: retailerNamePoints(receipt.retailer),
        roundDollarTotal: roundDollarPoints(totalCents),
        quarterMultipleTotal: quarterMultiplePoints(totalCents),
        itemPairs: itemPairPoints(receipt.items.length),
        descriptionLength: descriptionLengthPoints(receipt.items),
        afternoonPurchase: afternoonPurchasePoints(receipt.purchaseTime),
    };
}

export function totalPoints(breakdown: PointsBreakdown): number {
    return (
        breakdown.retailerName +
        breakdown.roundDollarTotal +
        breakdown.quarterMultipleTotal +
        breakdown.itemPairs +
        breakdown.descriptionLength +
        breakdown.afternoonPurchase
    );
}

export function calculatePoints(receipt: Receipt): number {
    return totalPoints(pointsBreakdown(receipt));
}
