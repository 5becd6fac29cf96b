type UserProps = {
	name: string;
};

export function UserProfile({name}: UserProps) {
	return <div className="profile">{name}</div>;
}
