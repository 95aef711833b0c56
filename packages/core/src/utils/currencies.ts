/** Minor-unit decimal places per supported ISO 4217 code. */
export const CURRENCY_DECIMALS: Readonly<Record<string, number>> = {
	SAR: 2,
	AED: 2,
	QAR: 2,
	EGP: 2,
	KWD: 3,
	BHD: 3,
	OMR: 3,
	JOD: 3,
	USD: 2,
	EUR: 2,
	GBP: 2,
	CHF: 2,
	CAD: 2,
	AUD: 2,
	INR: 2,
	PKR: 2,
	TRY: 2,
	CNY: 2,
	SGD: 2,
	MYR: 2,
	IDR: 2,
	ZAR: 2,
	NGN: 2,
	KES: 2,
	BRL: 2,
	MXN: 2,
	JPY: 0,
	KRW: 0,
};
