import { readFile } from 'fs/promises';
import { parse } from 'csv-parse';
import { injectable } from 'tsyringe';
import { RawShipmentRow } from '../../types/domain.types';
import { Result } from '../../types/result.types';
import { IShipmentSource } from './shipment-source.interface';

@injectable()
export class CsvShipmentSource implements IShipmentSource {
  async extractShipments(sourcePath: string): Promise<Result<RawShipmentRow[]>> {
    try {
      const content = await readFile(sourcePath, 'utf-8');
      const rows = await this.parseCsv(content);

      console.log(`[CSV Source] Extracted ${rows.length} rows from ${sourcePath}`);
      return {
        success: true,
        data: rows,
        message: `Extracted ${rows.length} rows from ${sourcePath}`
      };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      return {
        success: false,
        message: `Failed to read shipment source ${sourcePath}: ${errorMessage}`
      };
    }
  }

  private parseCsv(content: string): Promise<RawShipmentRow[]> {
    return new Promise((resolve, reject) => {
      parse(
        content,
        { columns: true, skip_empty_lines: true, trim: true, bom: true },
        (error, records: RawShipmentRow[]) => {
          if (error) {
            reject(error);
            return;
          }
          resolve(records);
        }
      );
    });
  }
}
