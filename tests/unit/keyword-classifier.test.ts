import { KeywordIntentClassifier } from '../../src/classifier/keyword-classifier';

describe('KeywordIntentClassifier', () => {
  const classifier = new KeywordIntentClassifier();
  const classify = (text: string) => classifier.classify({ history: [], text });

  it.each([
    ['I want to talk to a person', 'human_request'],
    ['Can someone contact me?', 'human_request'],
    ['Do you have backpacks?', 'product_inquiry'],
    ['How much is the trail cap', 'product_inquiry'],
    ['What are your opening hours?', 'general_question'],
    ['Where are you located', 'general_question'],
    ['Do you accept PayPal?', 'general_question'],
    ['Are there any promotions', 'general_question'],
    ['hello there', 'other'],
    ['thanks!', 'other'],
  ])('should classify %p as %s', async (text, label) => {
    await expect(classify(text)).resolves.toEqual({ label, detected: true });
  });

  it('should prefer a human request over a product mention', async () => {
    await expect(classify('Can I speak with someone about a product?')).resolves.toEqual({
      label: 'human_request',
      detected: true,
    });
  });

  it('should report gibberish as undetected', async () => {
    await expect(classify('asdkjh qwpoe')).resolves.toEqual({ label: 'undetected', detected: false });
  });
});
