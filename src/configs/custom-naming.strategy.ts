import { DefaultNamingStrategy, NamingStrategyInterface, Table } from 'typeorm';
import { snakeCase } from 'typeorm/util/StringUtils';
import pluralize from 'pluralize';

export class CustomNamingStrategy extends DefaultNamingStrategy implements NamingStrategyInterface {
    // Pluralized snake_case table names unless the entity names its table
    tableName(targetName: string, userSpecifiedName: string | undefined): string {
        return snakeCase(userSpecifiedName || pluralize(targetName.replace(/Entity$/, '')));
    }

    // snake_case columns, embedded prefixes included
    columnName(propertyName: string, customName: string, embeddedPrefixes: string[]): string {
        const baseName = customName || propertyName;
        return snakeCase(embeddedPrefixes.concat(baseName).join('_'));
    }

    primaryKeyName(tableOrName: Table | string): string {
        return `${this.bareTableName(tableOrName)}_pkey`;
    }

    // idx_recurring_invoices_status_next_occurrence_date; the migrations use the same names
    indexName(tableOrName: Table | string, columnNames: string[], where?: string): string {
        const name = `idx_${this.bareTableName(tableOrName)}_${columnNames.map((column) => snakeCase(column)).join('_')}`;
        return where ? `${name}_partial` : name;
    }

    private bareTableName(tableOrName: Table | string): string {
        const name = typeof tableOrName === 'string' ? tableOrName : tableOrName.name;
        return name.split('.').pop() ?? name;
    }
}
