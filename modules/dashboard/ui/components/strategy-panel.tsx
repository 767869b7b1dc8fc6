import ReactMarkdown from 'react-markdown';
import remarkGfm from 'remark-gfm';
import type { ReactNode } from 'react';
import { CheckCircle, Compass, Lightbulb, MapIcon, Target } from 'lucide-react';
import { Badge } from '@/components/ui/badge';
import type { DifferentiationReport } from '@/lib/types';
import { groupOpportunities } from '../../lib/opportunities';

function Section({
  title,
  icon,
  items,
}: {
  title: string;
  icon: ReactNode;
  items: string[];
}) {
  if (items.length === 0) return null;

  return (
    <section>
      <h3 className="text-xl font-bold mb-3 flex items-center gap-2">
        {icon} {title}
      </h3>
      <ul className="space-y-2 pl-2">
        {items.map((item, i) => (
          <li key={i} className="flex gap-2 items-start text-gray-300">
            <CheckCircle className="w-4 h-4 mt-1 text-green-400 flex-shrink-0" />
            <span>{item}</span>
          </li>
        ))}
      </ul>
    </section>
  );
}

function OpportunityMap({ report }: { report: DifferentiationReport }) {
  const groups = groupOpportunities(report.opportunityMap);
  if (groups.length === 0) return null;

  return (
    <section>
      <h3 className="text-xl font-bold mb-3 flex items-center gap-2">
        <MapIcon className="w-5 h-5 text-cyan-400" /> Opportunity Map
      </h3>
      <div className="grid gap-4 md:grid-cols-2">
        {groups.map((group) => (
          <div key={group.type} className="rounded-xl border border-white/10 bg-black/20 p-4">
            <h4 className="font-semibold text-purple-300 mb-2">{group.label}</h4>
            <ul className="space-y-2">
              {group.items.map((item, i) => (
                <li key={i} className="text-sm text-gray-300 space-x-2">
                  <Badge variant="outline">{item.category}</Badge>
                  <span>{item.description}</span>
                </li>
              ))}
            </ul>
          </div>
        ))}
      </div>
    </section>
  );
}

export default function StrategyPanel({ report }: { report: DifferentiationReport }) {
  return (
    <div className="space-y-8">
      <section>
        <h3 className="text-xl font-bold mb-3 flex items-center gap-2">
          <Compass className="w-5 h-5 text-purple-400" /> Positioning
        </h3>
        <div className="text-gray-300 leading-relaxed space-y-3 pl-4 border-l-4 border-purple-600">
          <ReactMarkdown remarkPlugins={[remarkGfm]}>{report.positioningNarrative}</ReactMarkdown>
        </div>
      </section>
      <Section
        title="Key Differentiators"
        icon={<Target className="w-5 h-5 text-pink-400" />}
        items={report.keyDifferentiators}
      />
      <div className="grid gap-8 md:grid-cols-2">
        <Section
          title="Market Gaps"
          icon={<Compass className="w-5 h-5 text-blue-400" />}
          items={report.gaps}
        />
        <Section
          title="Opportunities"
          icon={<Lightbulb className="w-5 h-5 text-yellow-400" />}
          items={report.opportunities}
        />
      </div>
      <OpportunityMap report={report} />
    </div>
  );
}
