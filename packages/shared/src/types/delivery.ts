export const NOT_AVAILABLE = 'N/A';

/**
 * Fields pulled out of a transcript. Text fields keep the spoken form
 * (trimmed), so `feedType` may read "Pellets" when the speaker said so.
 */
export interface ExtractedDelivery {
    clientIndex: string;
    quantity: number;
    feedType: string;
    price: number;
    location: string;
    notes: string;
    /** Always 0: no spoken keyword fills it yet. */
    debt: number;
    /** Always 0: no spoken keyword fills it yet. */
    overpaid: number;
}

export interface DeliveryRecord extends ExtractedDelivery {
    /** YYYY-MM-DD of the confirmation, not of the voice note. */
    date: string;
    senderId: string;
    reminders: string;
}

export type SheetCell = string | number;
