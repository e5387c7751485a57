import type { SampleContract } from "./index"

export const LEASE_AGREEMENT: SampleContract = {
  id: "lease-agreement",
  title: "Residential Lease (English / Hindi)",
  description:
    "A short residential lease with rupee and lakh amounts, a dated signing line, Tamil Nadu jurisdiction and one Hindi clause.",
  expectedClauseCount: 8,
  expectedContractType: "Lease Agreement",
  rawText: `LEASE AGREEMENT
This Lease Agreement is made at Chennai, Tamil Nadu on 01/04/2025 between the Landlord and the Tenant.
The Tenant shall pay a monthly rent of ₹45,000 on or before the fifth day of each month.
The Tenant shall pay a security deposit of 2 lakhs before taking possession.
The Tenant shall not sublet the premises without the written consent of the Landlord.
The Landlord may terminate this lease without notice if rent remains unpaid for two months.
A penalty of ₹500 per day applies to late payment of rent.
किरायेदार बिना सूचना परिसर खाली नहीं करेगा और देरी पर जुर्माना देगा।
This agreement is governed by the laws of India and courts at Chennai.`,
}
