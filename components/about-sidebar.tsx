export function AboutSidebar() {
  return (
    <aside className="lg:w-[420px] flex-shrink-0 bg-white/80 backdrop-blur-sm border-r border-green-200 p-6 space-y-5 text-sm text-gray-700">
      <div className="flex items-center gap-3">
        <div className="text-3xl">🌿</div>
        <h1 className="text-2xl font-bold bg-gradient-to-r from-green-700 to-blue-700 bg-clip-text text-transparent">
          GBIF Natural Language Search
        </h1>
      </div>

      <section className="space-y-2">
        <h2 className="text-lg font-semibold text-green-800">Overview</h2>
        <p>
          Search GBIF for preserved specimens by describing what you are looking for. Your query is interpreted into
          search parameters, which are shown above the results so you can check them. Results are listed 300 at a time
          and each page can be downloaded as a CSV file.
        </p>
        <p>Some things you can search for:</p>
        <ul className="list-disc pl-5 space-y-1">
          <li>Taxa, by scientific or common name</li>
          <li>Records from a particular institution or collection</li>
          <li>Records from a place: continent, country, state or locality</li>
          <li>Records collected at a particular time. Ranges are supported.</li>
          <li>Records collected by a particular person</li>
        </ul>
      </section>

      <section className="space-y-2">
        <h2 className="text-lg font-semibold text-green-800">Privacy and disclaimers</h2>
        <p>
          Queries are interpreted by an OpenAI model. Any text entered in the search box is sent to OpenAI. You may
          review the{' '}
          <a href="https://openai.com/policies/row-privacy-policy/" className="text-blue-700 hover:underline">
            OpenAI privacy policy
          </a>
          . This project is not endorsed by or affiliated with GBIF and comes with no uptime guarantees.
        </p>
      </section>
    </aside>
  );
}
