import type { NameResolution } from '@/lib/name-resolver';
import { PARAMETER_FIELDS, type CandidateParameters, type ParameterField } from '@/lib/search-schema';

interface InterpretedParametersProps {
  interpreted: CandidateParameters;
  resolutions: NameResolution[];
  institutionScoped: boolean;
}

const FIELD_LABELS: Record<ParameterField, string> = {
  taxon: 'Taxon',
  location: 'Locality',
  continent: 'Continent',
  country: 'Country',
  stateProvince: 'State / province',
  dateFrom: 'Collected from',
  dateTo: 'Collected to',
  collector: 'Collector',
  institution: 'Institution',
  collection: 'Collection',
  hasImage: 'Has image',
};

function describeResolution(resolution: NameResolution): string {
  switch (resolution.status) {
    case 'matched':
      return `matched ${resolution.label}`;
    case 'not-found':
      return 'no match found, not used as a filter';
    case 'failed':
      return 'lookup failed, not used as a filter';
  }
}

export function InterpretedParameters({ interpreted, resolutions, institutionScoped }: InterpretedParametersProps) {
  const rows = PARAMETER_FIELDS.flatMap((field) => {
    const value = interpreted[field];
    if (value === undefined) return [];
    const resolution = resolutions.find((entry) => entry.kind === field);
    return [{
      field,
      label: FIELD_LABELS[field],
      value: String(value),
      note: resolution ? describeResolution(resolution) : undefined,
    }];
  });

  return (
    <section className="bg-white/80 rounded-xl border border-green-200 shadow-sm p-4">
      <h2 className="text-lg font-semibold text-green-800 mb-3">Interpreted parameters</h2>
      <table className="w-full text-sm">
        <tbody>
          {rows.map((row) => (
            <tr key={row.field} className="border-t border-green-100">
              <th scope="row" className="text-left font-medium text-green-700 py-1 pr-4 w-48">{row.label}</th>
              <td className="py-1 text-gray-800">
                {row.value}
                {row.note && <span className="ml-2 text-xs text-gray-500">({row.note})</span>}
              </td>
            </tr>
          ))}
        </tbody>
      </table>
      {institutionScoped && (
        <p className="mt-3 text-xs text-gray-500">🏛️ Results are limited to this site&apos;s configured institution.</p>
      )}
    </section>
  );
}
