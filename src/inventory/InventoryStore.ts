import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { Logger } from 'winston';
import { ZodError } from 'zod';
import { defaultLogger } from '../logging/Logger';
import { InventoryLoadError } from '../manager/errors';
import { TAWSInventoryReport, TInventory } from '../manager/model';
import { describeZodError, errorMessage, parseInventoryReport, toInventory, toInventoryReport } from '../utils/helpers';

/*
Reads and writes inventories in the same JSON layout Glacier's inventory-retrieval job produces,
so a saved file can be fed back with --load-inventory or inspected with other tooling.
*/
export class InventoryStore {

    constructor(private readonly logger: Logger = defaultLogger) {
    }

    public static serialize(inventory: TInventory): string {
        return JSON.stringify(toInventoryReport(inventory), null, 2) + '\n';
    }

    public async save(path: string, inventory: TInventory): Promise<void> {
        this.logger.info(`Saving inventory to ${path}...`);
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, InventoryStore.serialize(inventory), { encoding: 'utf8' });
        this.logger.info(`Inventory saved successfully (${inventory.archiveList.length} archives).`);
    }

    public async load(path: string): Promise<TInventory> {
        this.logger.info(`Loading inventory from ${path}...`);

        let content: string;
        try {
            content = await readFile(path, { encoding: 'utf8' });
        } catch (err) {
            throw new InventoryLoadError(path, `Cannot read inventory file ${path}: ${errorMessage(err)}`, err);
        }

        let report: TAWSInventoryReport;
        try {
            report = parseInventoryReport(JSON.parse(content));
        } catch (err) {
            const reason = err instanceof ZodError ? describeZodError(err) : 'not valid JSON';
            throw new InventoryLoadError(path, `Inventory file ${path} is malformed (${reason})`, err);
        }

        const inventory = toInventory(report);
        this.logger.info(`Inventory loaded successfully (${inventory.archiveList.length} archives).`);
        return inventory;
    }
}
