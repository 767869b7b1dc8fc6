import type { LandscapeEntry } from '@/lib/types';

export default function LandscapeTable({ landscape }: { landscape: LandscapeEntry[] }) {
  if (landscape.length === 0) return null;

  return (
    <section>
      <h3 className="text-lg font-bold mb-3">Competitive landscape</h3>
      <div className="overflow-x-auto">
        <table className="w-full text-sm border-separate border-spacing-y-1">
          <thead>
            <tr className="text-left text-gray-400">
              <th className="font-medium px-2">Competitor</th>
              <th className="font-medium px-2">Pricing</th>
              <th className="font-medium px-2">Audience</th>
              <th className="font-medium px-2">USP</th>
              <th className="font-medium px-2 text-right">Features</th>
            </tr>
          </thead>
          <tbody>
            {landscape.map((entry) => (
              <tr key={entry.name} className="bg-black/20 text-gray-300">
                <th scope="row" className="text-left font-semibold text-gray-100 px-2 py-1">
                  {entry.name}
                </th>
                <td className="px-2 py-1">{entry.pricingModel}</td>
                <td className="px-2 py-1">{entry.targetAudience}</td>
                <td className="px-2 py-1">{entry.usp}</td>
                <td className="px-2 py-1 text-right">{entry.featureCount}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </section>
  );
}
