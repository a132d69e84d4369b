import { google, type sheets_v4 } from 'googleapis';
import type { DeliveryRecord, SheetCell } from '../types/delivery.js';
import type { DeliveryRecorder, PersistenceResult } from '../types/collaborators.js';

export interface DeliverySheetConfigs {
    credentialsPath: string;
    sheetId: string;
    worksheetName: string;
}

const SHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';

// Column order downstream consumers read. debt and overpaid are not written.
export function toSheetRow(record: DeliveryRecord): SheetCell[] {
    return [
        record.date,
        record.senderId,
        record.clientIndex,
        record.quantity,
        record.feedType,
        record.price,
        record.location,
        record.notes,
        record.reminders
    ];
}

export class DeliverySheetClient implements DeliveryRecorder {
    private sheets: sheets_v4.Sheets;
    private configs: DeliverySheetConfigs;

    constructor(configs: DeliverySheetConfigs) {
        if (!configs.credentialsPath || !configs.sheetId || !configs.worksheetName) {
            throw new Error('Google Sheets configuration error: credentialsPath, sheetId and worksheetName are required');
        }

        this.configs = configs;
        const auth = new google.auth.GoogleAuth({
            keyFile: configs.credentialsPath,
            scopes: [SHEETS_SCOPE]
        });
        this.sheets = google.sheets({ version: 'v4', auth });
    }

    async appendDelivery(record: DeliveryRecord): Promise<PersistenceResult> {
        try {
            await this.sheets.spreadsheets.values.append({
                spreadsheetId: this.configs.sheetId,
                range: `${this.configs.worksheetName}!A1`,
                valueInputOption: 'RAW',
                insertDataOption: 'INSERT_ROWS',
                requestBody: {
                    values: [toSheetRow(record)]
                }
            });

            console.log('[DeliverySheetClient] Appended delivery row for:', record.senderId);
            return { success: true };
        } catch (error) {
            console.error('[DeliverySheetClient] Error appending delivery row:', error);
            return {
                success: false,
                error: error instanceof Error ? error.message : 'Unknown error'
            };
        }
    }
}
