export type Reference = {
  authors: string;
  year: number;
  title: string;
  venue: string;
  details: string;
  doi: string;
};

export const references: readonly Reference[] = [
  {
    authors: 'Sperry, Roger',
    year: 1984,
    title: 'Consciousness, Personal Identity and the Divided Brain',
    venue: 'Neuropsychologia',
    details: '22 (6): 661–73',
    doi: '10.1016/0028-3932(84)90093-9',
  },
  {
    authors: 'Tononi, Giulio',
    year: 2004,
    title: 'An Information Integration Theory of Consciousness',
    venue: 'BMC Neuroscience',
    details: '5 (1): 42',
    doi: '10.1186/1471-2202-5-42',
  },
  {
    authors: 'Tononi, Giulio, and Gerald M. Edelman',
    year: 1998,
    title: 'Consciousness and Complexity',
    venue: 'Science',
    details: '282 (5395): 1846–51',
    doi: '10.1126/science.282.5395.1846',
  },
];

export function doiUrl(ref: Reference): string {
  return `https://doi.org/${ref.doi}`;
}
