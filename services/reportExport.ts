import html2canvas from 'html2canvas';
import { jsPDF } from 'jspdf';

export const reportFileName = (projectName: string): string => {
  const clean = projectName.replace(/[^a-z0-9]/gi, '_').toLowerCase();
  return `${clean}_Motor_Protection_Report.pdf`;
};

/**
 * Captures an element and writes it to an A4 PDF, fitted to the page width and
 * split over as many pages as the image needs.
 */
export const exportElementToPdf = async (element: HTMLElement, fileName: string): Promise<void> => {
  const canvas = await html2canvas(element, {
    scale: 2,
    useCORS: true,
    logging: false,
    backgroundColor: '#f8fafc',
    ignoreElements: (el) => el.hasAttribute('data-html2canvas-ignore'),
  });
  const imgData = canvas.toDataURL('image/png');

  const pdf = new jsPDF('p', 'mm', 'a4');
  const pageWidth = pdf.internal.pageSize.getWidth();
  const pageHeight = pdf.internal.pageSize.getHeight();
  const imgProps = pdf.getImageProperties(imgData);
  const imgHeight = (imgProps.height * pageWidth) / imgProps.width;

  let heightLeft = imgHeight;
  pdf.addImage(imgData, 'PNG', 0, 0, pageWidth, imgHeight);
  heightLeft -= pageHeight;

  while (heightLeft > 0) {
    pdf.addPage();
    pdf.addImage(imgData, 'PNG', 0, heightLeft - imgHeight, pageWidth, imgHeight);
    heightLeft -= pageHeight;
  }

  pdf.save(fileName);
};
