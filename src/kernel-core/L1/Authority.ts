import type { PrincipalID } from '../L0/Ontology.js';
import { PrivilegeGuard } from '../L0/Guards.js';
import type { StateModel } from '../L2/State.js';
import { KernelError } from '../Errors.js';

/**
 * Answers the single question the kernel asks about callers: does this
 * principal hold the privilege the operation requires. Role management
 * itself lives outside the kernel.
 */
export class AuthorityEngine {
    constructor(private readonly state: StateModel) { }

    public authorized(principalId: PrincipalID, privilege: string | null): boolean {
        return PrivilegeGuard({ principalId, principal: this.state.getPrincipal(principalId), privilege }).ok;
    }

    public require(principalId: PrincipalID, privilege: string): void {
        const result = PrivilegeGuard({ principalId, principal: this.state.getPrincipal(principalId), privilege });
        if (!result.ok) {
            throw new KernelError(result.code, result.violation, { principalId, privilege });
        }
    }
}
