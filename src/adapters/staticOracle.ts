/**
 * Static market reference stand-in: returns whatever quote was last published
 * for a source.
 */

import { Identity, OracleQuote } from '../types';
import { InvalidArgument } from '../errors';
import { normalizeIdentity } from '../core/identity';
import { OracleCollaborator } from '../hook/collaborators';

export class StaticOracle implements OracleCollaborator {
    private readonly quotes = new Map<Identity, OracleQuote>();
    private reads = 0;

    publish(referenceSource: Identity, quote: OracleQuote): void {
        this.quotes.set(normalizeIdentity(referenceSource, 'referenceSource'), quote);
    }

    readLatestQuote(referenceSource: Identity): OracleQuote {
        this.reads++;
        const quote = this.quotes.get(referenceSource.toLowerCase());
        if (!quote) {
            throw new InvalidArgument('no quote published for source', { referenceSource });
        }
        return quote;
    }

    get readCount(): number {
        return this.reads;
    }
}
