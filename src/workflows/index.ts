import { type KindRegistry, createKindRegistry } from "../core/workflow-definition";
import { articleWorkflow } from "./article";
import { companyWorkflow } from "./company";

export { articleWorkflow, ARTICLE_FIELDS } from "./article";
export { companyWorkflow, COMPANY_FIELDS } from "./company";

export const builtInKinds = (): KindRegistry =>
  createKindRegistry([companyWorkflow, articleWorkflow]);
