import { Injectable } from "@nestjs/common";

import { TableMetadataService } from "./table-metadata.service";
import { parseSelector } from "./table-ref";
import type { TableRef } from "./table-ref";

/**
 * Expands `catalog` or `catalog.schema` into table references, in the order
 * the workspace lists them.
 */
@Injectable()
export class TableEnumerator {
  constructor(private readonly metadata: TableMetadataService) {}

  async enumerate(selector: string): Promise<TableRef[]> {
    const { catalog, schema } = parseSelector(selector);
    const schemas =
      schema === undefined ? await this.metadata.listSchemas(catalog) : [schema];

    const tables: TableRef[] = [];
    for (const schemaName of schemas) {
      const names = await this.metadata.listTables(catalog, schemaName);
      tables.push(
        ...names.map((table) => ({ catalog, schema: schemaName, table })),
      );
    }
    return tables;
  }
}
