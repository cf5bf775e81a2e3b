import React from 'react';
import { doiUrl, references as defaultReferences } from '../data/references';
import type { Reference } from '../data/references';

export type ReferencesListProps = {
  references?: readonly Reference[];
};

/** Chicago author-date, venue in italics. */
export function ReferencesList({ references = defaultReferences }: ReferencesListProps) {
  return (
    <section data-testid="references" style={{ display: 'flex', flexDirection: 'column', gap: 10, paddingTop: 8 }}>
      <h2 style={{ margin: 0 }}>References</h2>
      {references.map((ref) => (
        <p key={ref.doi} data-testid="reference" style={{ fontSize: 13, margin: 0 }}>
          {ref.authors}. {ref.year}. “{ref.title}.” <em>{ref.venue}</em> {ref.details}.{' '}
          <a href={doiUrl(ref)}>{doiUrl(ref)}</a>.
        </p>
      ))}
    </section>
  );
}
