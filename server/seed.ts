import type { InsertPrecedent } from "@shared/schema";

export const SAMPLE_PRECEDENTS: InsertPrecedent[] = [
  {
    title: "Smith v. Johnson",
    caseNumber: "2023-CV-001",
    year: 2023,
    court: "Supreme Court",
    description: "Landmark case establishing precedent for contract law.",
    keywords: "contract, liability, negligence",
  },
  {
    title: "Brown v. Board of Education",
    caseNumber: "1954-SC-001",
    year: 1954,
    court: "Supreme Court",
    description: "Landmark case on equal protection and education.",
    keywords: "education, equality, civil rights",
    article: "Fourteenth Amendment",
  },
  {
    title: "Marbury v. Madison",
    caseNumber: "1803-SC-001",
    year: 1803,
    court: "Supreme Court",
    description: "Established judicial review in the United States.",
    keywords: "judicial review, constitutional law",
  },
  {
    title: "Kesavananda Bharati v. State of Kerala",
    caseNumber: "(1973) 4 SCC 225",
    year: 1973,
    court: "Supreme Court of India",
    description: "Held that Parliament may amend the Constitution but cannot alter its basic structure.",
    keywords: "basic structure, constitutional amendments",
    article: "Article 368",
  },
  {
    title: "Donoghue v. Stevenson",
    caseNumber: "[1932] AC 562",
    year: 1932,
    court: "House of Lords",
    description: "Established the modern duty of care owed to one's neighbour in negligence.",
    keywords: "negligence, duty of care, tort",
  },
];
