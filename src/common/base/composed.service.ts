import { BaseService } from "./base.service";
import { WithLifecycle } from "./mixins/lifecycle.mixin";

/**
 * Service with lifecycle management: managed intervals and init/cleanup hooks
 */
export abstract class StandardService extends WithLifecycle(BaseService) {}
