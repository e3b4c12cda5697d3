import { Global, Module } from "@nestjs/common";

import { GovernanceSettings } from "./governance-settings";

@Global()
@Module({
  providers: [GovernanceSettings],
  exports: [GovernanceSettings],
})
export class GovernanceSettingsModule {}
