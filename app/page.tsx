import { AboutSidebar } from '@/components/about-sidebar';
import { OccurrenceSearch } from '@/components/occurrence-search';
import { CONFIG } from '@/lib/config';

// INSTITUTION_KEY is read at request time, not baked in at build time
export const dynamic = 'force-dynamic';

export default function Home() {
  return (
    <div className="min-h-screen bg-gradient-to-br from-green-50 to-blue-50 flex flex-col lg:flex-row">
      <AboutSidebar />
      <main className="flex-1 p-6 lg:p-10 max-w-6xl">
        <OccurrenceSearch
          institutionScoped={Boolean(CONFIG.gbif.institutionKey)}
          maxQueryLength={CONFIG.search.maxQueryLength}
        />
      </main>
    </div>
  );
}
