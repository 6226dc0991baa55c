// src/sinks/SpreadsheetApi.ts

import { google, sheets_v4 } from 'googleapis';

type OAuth2Client = InstanceType<typeof google.auth.OAuth2>;

export const SHEETS_SCOPE = 'https://www.googleapis.com/auth/spreadsheets';

export interface SpreadsheetInfo {
  title: string;
  tabs: string[];
}

/**
 * The slice of the Sheets v4 API the remote sink needs. Ranges are A1
 * notation including the quoted tab name.
 */
export interface SpreadsheetApi {
  getSpreadsheet(spreadsheetId: string): Promise<SpreadsheetInfo>;
  addTab(spreadsheetId: string, title: string): Promise<void>;
  getValues(spreadsheetId: string, range: string): Promise<string[][]>;
  updateValues(spreadsheetId: string, range: string, values: string[][]): Promise<void>;
  appendValues(spreadsheetId: string, range: string, values: string[][]): Promise<void>;
  clearValues(spreadsheetId: string, range: string): Promise<void>;
}

export type SheetsAuth =
  | { kind: 'serviceAccount'; keyFile: string }
  | { kind: 'delegated'; getAccessToken: () => Promise<string> };

export function quoteTab(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

export class GoogleSpreadsheetApi implements SpreadsheetApi {
  private sheets: sheets_v4.Sheets;
  private oauthClient?: OAuth2Client;
  private tokenProvider?: () => Promise<string>;

  constructor(auth: SheetsAuth) {
    if (auth.kind === 'serviceAccount') {
      const googleAuth = new google.auth.GoogleAuth({ keyFile: auth.keyFile, scopes: [SHEETS_SCOPE] });
      this.sheets = google.sheets({ version: 'v4', auth: googleAuth });
    } else {
      const client = new google.auth.OAuth2();
      this.oauthClient = client;
      this.tokenProvider = auth.getAccessToken;
      this.sheets = google.sheets({ version: 'v4', auth: client });
    }
  }

  async getSpreadsheet(spreadsheetId: string): Promise<SpreadsheetInfo> {
    await this.authorize();
    const response = await this.sheets.spreadsheets.get({
      spreadsheetId,
      fields: 'properties.title,sheets.properties.title',
    });
    return {
      title: response.data.properties?.title ?? '',
      tabs: (response.data.sheets ?? [])
        .map((sheet) => sheet.properties?.title)
        .filter((title): title is string => typeof title === 'string'),
    };
  }

  async addTab(spreadsheetId: string, title: string): Promise<void> {
    await this.authorize();
    await this.sheets.spreadsheets.batchUpdate({
      spreadsheetId,
      requestBody: { requests: [{ addSheet: { properties: { title } } }] },
    });
  }

  async getValues(spreadsheetId: string, range: string): Promise<string[][]> {
    await this.authorize();
    const response = await this.sheets.spreadsheets.values.get({
      spreadsheetId,
      range,
      valueRenderOption: 'UNFORMATTED_VALUE',
    });
    const values: unknown[][] = response.data.values ?? [];
    return values.map((row) => row.map((cell) => (cell === null || cell === undefined ? '' : String(cell))));
  }

  async updateValues(spreadsheetId: string, range: string, values: string[][]): Promise<void> {
    await this.authorize();
    await this.sheets.spreadsheets.values.update({
      spreadsheetId,
      range,
      valueInputOption: 'RAW',
      requestBody: { values },
    });
  }

  async appendValues(spreadsheetId: string, range: string, values: string[][]): Promise<void> {
    await this.authorize();
    await this.sheets.spreadsheets.values.append({
      spreadsheetId,
      range,
      valueInputOption: 'RAW',
      insertDataOption: 'INSERT_ROWS',
      requestBody: { values },
    });
  }

  async clearValues(spreadsheetId: string, range: string): Promise<void> {
    await this.authorize();
    await this.sheets.spreadsheets.values.clear({ spreadsheetId, range, requestBody: {} });
  }

  // Delegated identities may have refreshed since the last call
  private async authorize(): Promise<void> {
    if (this.oauthClient && this.tokenProvider) {
      this.oauthClient.setCredentials({ access_token: await this.tokenProvider() });
    }
  }
}
