import { Injectable } from "@nestjs/common";

import { TableMetadataService } from "../../table-checks/table-metadata.service";
import { parseTableName } from "../../table-checks/table-ref";
import { assertThat } from "../policy-assertion.error";
import type { StepBindings, StepRegistry } from "../step-registry";

@Injectable()
export class TableExistenceSteps implements StepBindings {
  constructor(private readonly metadata: TableMetadataService) {}

  register(registry: StepRegistry): void {
    registry.define("I check for the table {string}", async (context, args) => {
      const fullName = args.text(0);
      const found = await this.metadata.tableExists(parseTableName(fullName));
      context.tableLookup = { fullName, found };
    });

    registry.define("the table should exist", (context) => {
      const lookup = context.requireTableLookup();
      assertThat(lookup.found, `Table ${lookup.fullName} was not found`);
    });

    registry.define("the table should not exist", (context) => {
      const lookup = context.requireTableLookup();
      assertThat(!lookup.found, `Table ${lookup.fullName} was found but should not exist`);
    });
  }
}
