interface SavingsOption {
  title: string;
  body: string;
  savings: string;
  link: { label: string; href: string };
}

const SAVINGS_OPTIONS: SavingsOption[] = [
  {
    title: "Child and Dependent Care Tax Credit",
    body: "Claim 20% to 35% of up to $3,000 in childcare expenses for one child, or up to $6,000 for two or more. Depending on income the credit is worth $600 to $2,100 a year.",
    savings: "$600 – $2,100",
    link: {
      label: "IRS: Am I eligible to claim the Child and Dependent Care Credit?",
      href: "https://www.irs.gov/help/ita/am-i-eligible-to-claim-the-child-and-dependent-care-credit",
    },
  },
  {
    title: "Dependent Care FSA",
    body: "Set aside pre-tax dollars for eligible childcare expenses: up to $5,000 a year if single or married filing jointly, $2,500 if married filing separately.",
    savings: "$1,000 – $1,750",
    link: {
      label: "Investopedia: Dependent Care FSA",
      href: "https://www.investopedia.com/articles/pf/09/dependent-care-fsa.asp",
    },
  },
  {
    title: "State-specific programs",
    body: "Many states offer childcare assistance, subsidies or grants to low- and middle-income families. Eligibility and benefits vary by state.",
    savings: "0% – 100%",
    link: { label: "ChildCare.gov", href: "https://www.childcare.gov/" },
  },
];

const REFERENCES = [
  { label: "Child Care Aware of America", href: "https://www.childcareaware.org/" },
  { label: "Childcare Technical Assistance Network", href: "https://childcareta.acf.hhs.gov/" },
  { label: "Office of Child Care", href: "https://www.acf.hhs.gov/occ" },
  {
    label: "Tax Credits for Child Care Expenses",
    href: "https://www.irs.gov/credits-deductions/individuals/child-and-dependent-care-credit",
  },
  { label: "ChildCare.gov", href: "https://www.childcare.gov/" },
];

export function SavingsCard() {
  return (
    <section className="rounded-3xl border border-slate-300 bg-white p-5 shadow-sm">
      <header className="mb-4 flex items-center justify-between">
        <h3 className="text-base font-semibold text-slate-800">Ways to Save</h3>
        <span className="text-xs font-semibold uppercase tracking-wide text-slate-500">Annual Savings</span>
      </header>

      <ul className="space-y-3">
        {SAVINGS_OPTIONS.map((option) => (
          <li key={option.title} className="grid gap-3 rounded-2xl border border-slate-200 px-4 py-3 sm:grid-cols-[1fr,auto]">
            <div className="text-sm text-slate-600">
              <p className="font-semibold text-slate-800">{option.title}</p>
              <p className="mt-1">{option.body}</p>
              <a className="mt-1 inline-block text-xs text-slate-500 underline" href={option.link.href} target="_blank" rel="noreferrer">
                {option.link.label}
              </a>
            </div>
            <p className="self-center text-lg font-semibold text-slate-900">{option.savings}</p>
          </li>
        ))}
      </ul>

      <details className="mt-4 text-xs text-slate-500">
        <summary className="cursor-pointer font-semibold text-slate-600">References and Resources</summary>
        <ul className="mt-2 list-disc space-y-1 pl-4">
          {REFERENCES.map((reference) => (
            <li key={reference.href}>
              <a className="underline" href={reference.href} target="_blank" rel="noreferrer">
                {reference.label}
              </a>
            </li>
          ))}
        </ul>
      </details>
    </section>
  );
}
