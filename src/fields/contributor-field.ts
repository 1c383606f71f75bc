import { EDPOPREC, RELATORS, RELATORS_BASE } from '../rdf/namespaces.js';
import { Field, type NormalizationResult, type Subfield } from './field.js';
import { normalizeContributorName } from './normalizers.js';
import { relatorLabel } from './vocabularies.js';

/**
 * A person or organisation that contributed to a work, with their role
 * expressed as a Library of Congress relator.
 */
export class ContributorField extends Field {
    protected override readonly rdfClass = EDPOPREC('ContributorField');

    name: string | null = null;

    /** Relator IRI, e.g. `http://id.loc.gov/vocabulary/relators/aut` */
    role: string | null = null;

    /**
     * Create a contributor with a relator code such as `aut` or `prt`.
     */
    static withRole(originalText: string, relatorCode: string): ContributorField {
        const field = new ContributorField(originalText);
        field.role = RELATORS(relatorCode).value;
        return field;
    }

    override get summaryText(): string | null {
        if (this.name === null) return null;
        const role = this.roleLabel();
        return role ? `${this.name} (${role})` : this.name;
    }

    override normalize(): NormalizationResult {
        return normalizeContributorName(this);
    }

    protected override subfields(): Subfield[] {
        return [
            ...super.subfields(),
            { name: 'name', predicate: EDPOPREC('name'), datatype: 'string', value: () => this.name },
            { name: 'role', predicate: EDPOPREC('role'), datatype: 'uriref', value: () => this.role },
        ];
    }

    private roleLabel(): string | null {
        if (this.role === null) return null;
        if (!this.role.startsWith(RELATORS_BASE)) return this.role;
        const code = this.role.slice(RELATORS_BASE.length);
        return relatorLabel(code) ?? code;
    }
}
