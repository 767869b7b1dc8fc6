'use client';

import { motion } from 'framer-motion';
import { ExternalLink } from 'lucide-react';
import {
  Accordion,
  AccordionContent,
  AccordionItem,
  AccordionTrigger,
} from '@/components/ui/accordion';
import { Badge } from '@/components/ui/badge';
import type { Competitor } from '@/lib/types';

const FACTS = [
  ['pricingModel', 'Pricing'],
  ['targetAudience', 'Audience'],
  ['usp', 'USP'],
] as const;

function ProfileFacts({ competitor }: { competitor: Competitor }) {
  const facts = FACTS.filter(([field]) => competitor[field]);
  if (facts.length === 0) return null;

  return (
    <dl className="grid grid-cols-[auto_1fr] gap-x-3 gap-y-1 text-sm">
      {facts.map(([field, label]) => (
        <div key={field} className="contents">
          <dt className="text-gray-500">{label}</dt>
          <dd className="text-gray-300">{competitor[field]}</dd>
        </div>
      ))}
    </dl>
  );
}

export default function CompetitorsPanel({ competitors }: { competitors: Competitor[] }) {
  if (competitors.length === 0)
    return (
      <p className="text-gray-400 text-center py-10">
        No competitors were found for this idea.
      </p>
    );

  return (
    <Accordion type="multiple" className="space-y-3">
      {competitors.map((competitor, idx) => (
        <motion.div
          key={competitor.name}
          initial={{ opacity: 0, y: 20 }}
          animate={{ opacity: 1, y: 0 }}
          transition={{ delay: idx * 0.05 }}
        >
          <AccordionItem
            value={competitor.name}
            className="border border-white/10 rounded-xl px-4 bg-black/20"
          >
            <AccordionTrigger className="text-lg font-semibold hover:text-purple-300">
              {competitor.name}
            </AccordionTrigger>
            <AccordionContent className="space-y-3">
              <p className="text-gray-300 leading-relaxed">{competitor.description}</p>
              <ProfileFacts competitor={competitor} />
              {competitor.notableFeatures.length > 0 && (
                <div className="flex flex-wrap gap-2">
                  {competitor.notableFeatures.map((feature) => (
                    <Badge key={feature} variant="outline">{feature}</Badge>
                  ))}
                </div>
              )}
              {competitor.sourceUrls.length > 0 && (
                <ul className="space-y-1">
                  {competitor.sourceUrls.map((url) => (
                    <li key={url}>
                      <a
                        href={url}
                        target="_blank"
                        rel="noopener noreferrer"
                        className="inline-flex items-center gap-1 text-xs text-purple-300 hover:underline break-all"
                      >
                        <ExternalLink className="w-3 h-3" /> {url}
                      </a>
                    </li>
                  ))}
                </ul>
              )}
            </AccordionContent>
          </AccordionItem>
        </motion.div>
      ))}
    </Accordion>
  );
}
