import { DocumentRole } from '../domain/document';

export interface ContractTemplate {
  id: string;
  role: DocumentRole;
  title: string;
  documentType: string;
  variables: string[];
  sections: string[];
  signatureLabel: string;
}

export const CONTRACT_TEMPLATES: ContractTemplate[] = [
  {
    id: 'patient-care-agreement',
    role: 'patient',
    title: 'Patient Care and Financial Responsibility Agreement',
    documentType: 'care_agreement',
    variables: ['name', 'dateOfBirth', 'insurancePlan'],
    sections: ['Parties', 'Scope of Care', 'Insurance and Billing', 'Privacy', 'Consent'],
    signatureLabel: 'Patient',
  },
  {
    id: 'provider-network-agreement',
    role: 'provider',
    title: 'Provider Network Participation Agreement',
    documentType: 'network_agreement',
    variables: ['providerName', 'npi', 'specialty', 'insurerName'],
    sections: ['Parties', 'Credentialing', 'Reimbursement', 'Claims Submission', 'Term and Termination'],
    signatureLabel: 'Provider',
  },
  {
    id: 'insurer-coverage-approval',
    role: 'insurer',
    title: 'Coverage Approval and Prior Authorization',
    documentType: 'coverage_approval',
    variables: ['memberName', 'planName', 'procedures', 'effectiveDate'],
    sections: ['Member', 'Approved Services', 'Cost Sharing', 'Validity', 'Appeals'],
    signatureLabel: 'Insurer Representative',
  },
  {
    id: 'pharmacy-dispensing-agreement',
    role: 'pharmacy',
    title: 'Prescription Dispensing Agreement',
    documentType: 'dispensing_agreement',
    variables: ['patientName', 'medication', 'dosage', 'prescriber'],
    sections: ['Prescription', 'Dosage and Instructions', 'Substitution', 'Refills', 'Acknowledgement'],
    signatureLabel: 'Pharmacist',
  },
  {
    id: 'administrator-data-sharing-agreement',
    role: 'administrator',
    title: 'Health Information Data Sharing Agreement',
    documentType: 'data_sharing_agreement',
    variables: ['organizationName', 'counterpartyName', 'dataCategories'],
    sections: ['Parties', 'Permitted Uses', 'Safeguards', 'Breach Notification', 'Term'],
    signatureLabel: 'Administrator',
  },
];
