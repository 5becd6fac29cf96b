export function authFixture() {
	return 'token';
}
